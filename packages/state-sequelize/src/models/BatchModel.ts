import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface BatchRow {
  id: string;
  jobId: string;
  batchIndex: number;
  status: string;
  attemptCount: number;
  maxRetries: number;
  inputRef: string;
  targetCount: number;
  firstTargetIndex: number;
  outputRef: string | null;
  recordCount: number | null;
  lastError: string | null;
  workerId: string | null;
  claimedAt: number | string | null;
  availableAt: number | string | null;
  completedAt: number | string | null;
  /** Bumped on every write; updates are conditional on the version read. */
  version: number;
}

export type BatchModel = ModelStatic<Model<BatchRow, BatchRow>>;

export function defineBatchModel(sequelize: Sequelize, tablePrefix: string): BatchModel {
  return sequelize.define<Model<BatchRow, BatchRow>>(
    `${tablePrefix}_batch`,
    {
      id: {
        type: DataTypes.STRING(160),
        primaryKey: true,
        allowNull: false,
      },
      jobId: {
        type: DataTypes.STRING(128),
        allowNull: false,
      },
      batchIndex: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
        defaultValue: 'PENDING',
      },
      attemptCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      maxRetries: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      inputRef: {
        type: DataTypes.STRING(512),
        allowNull: false,
      },
      targetCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      firstTargetIndex: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      outputRef: {
        type: DataTypes.STRING(512),
        allowNull: true,
      },
      recordCount: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      lastError: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      workerId: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
      claimedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      availableAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      version: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
    },
    {
      tableName: `${tablePrefix}_batches`,
      timestamps: false,
      indexes: [{ fields: ['jobId', 'status'] }, { unique: true, fields: ['jobId', 'batchIndex'] }],
    },
  );
}

import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** Column values of a job row. BIGINT columns may come back as strings (PostgreSQL). */
export interface JobRow {
  id: string;
  owner: string | null;
  status: string;
  createdAt: number | string;
  startedAt: number | string | null;
  completedAt: number | string | null;
  totalBatches: number;
  totalTargets: number;
  batchSize: number;
  maxRetries: number;
  inputRef: string;
  finalArtifactRef: string | null;
  failureCode: string | null;
  failureMessage: string | null;
  failureBatchId: string | null;
  failureBatchIndex: number | null;
  archivedAt: number | string | null;
  metadata: unknown;
  rerunOf: string | null;
}

export type JobModel = ModelStatic<Model<JobRow, JobRow>>;

export function defineJobModel(sequelize: Sequelize, tablePrefix: string): JobModel {
  return sequelize.define<Model<JobRow, JobRow>>(
    `${tablePrefix}_job`,
    {
      id: {
        type: DataTypes.STRING(128),
        primaryKey: true,
        allowNull: false,
      },
      owner: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      totalBatches: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      totalTargets: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      batchSize: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      maxRetries: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      inputRef: {
        type: DataTypes.STRING(512),
        allowNull: false,
      },
      finalArtifactRef: {
        type: DataTypes.STRING(512),
        allowNull: true,
      },
      failureCode: {
        type: DataTypes.STRING(64),
        allowNull: true,
      },
      failureMessage: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      failureBatchId: {
        type: DataTypes.STRING(160),
        allowNull: true,
      },
      failureBatchIndex: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      archivedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      metadata: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      rerunOf: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}_jobs`,
      timestamps: false,
      indexes: [{ fields: ['status'] }, { fields: ['owner'] }, { fields: ['createdAt'] }],
    },
  );
}

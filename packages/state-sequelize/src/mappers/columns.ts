/** BIGINT epoch column to milliseconds. */
export function toMillis(value: number | string | null): number | undefined {
  return value === null ? undefined : Number(value);
}

export type RawValue = string | number | null | undefined;

/** One input row: source column name to scalar cell value. */
export type RawRecord = Record<string, RawValue>;

// pg の Pool / PoolClient のうち、アダプタが使う部分だけを切り出した型。
// テストでは同じ形の偽クライアントを渡す。
export interface QueryResultLike {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface SqlClient extends Queryable {
  release(): void;
}

export interface SqlPool extends Queryable {
  connect(): Promise<SqlClient>;
}

const fail = (key: string, expected: string, value: unknown): never => {
  throw new Error(`列 ${key} を ${expected} として読めません: ${String(value)}`);
};

export const readString = (row: Record<string, unknown>, key: string): string => {
  const value = row[key];
  return typeof value === 'string' ? value : fail(key, 'string', value);
};

export const readNullableString = (
  row: Record<string, unknown>,
  key: string
): string | null => (row[key] == null ? null : readString(row, key));

// BIGINT / NUMERIC / count(*) は文字列で返る
export const readNumber = (row: Record<string, unknown>, key: string): number => {
  const value = row[key];
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed)
    ? parsed
    : fail(key, 'number', value);
};

export const readNullableNumber = (
  row: Record<string, unknown>,
  key: string
): number | null => (row[key] == null ? null : readNumber(row, key));

export const readNullableDate = (
  row: Record<string, unknown>,
  key: string
): Date | null => {
  const value = row[key];
  if (value == null) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'string' && !Number.isNaN(Date.parse(value))) {
    return new Date(value);
  }
  return fail(key, 'timestamp', value);
};

export const readDate = (row: Record<string, unknown>, key: string): Date =>
  readNullableDate(row, key) ?? fail(key, 'timestamp', row[key]);

// pg は JSONB をパース済みで返すが、文字列で来た場合も受け付ける
export const readJson = (row: Record<string, unknown>, key: string): unknown => {
  const value = row[key];
  if (typeof value !== 'string') return value ?? null;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new Error(`列 ${key} の JSON を解析できません`, { cause: error });
  }
};

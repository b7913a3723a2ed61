/**
 * Value stored under `key` on the record itself. Names such as `constructor`
 * or `toString` are valid registry keys, so plain indexing would find
 * Object.prototype members.
 */
export function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

// Flow documents, discovery metadata and CLI input all pick the keys of these
// records, so a lookup must never land on an Object.prototype member.

export function own<T>(rec: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(rec, key) ? rec[key] : undefined;
}

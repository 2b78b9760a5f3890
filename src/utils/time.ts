export function toUtcIsoSeconds(date: Date): string {
  const iso = date.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoSeconds(): string {
  return toUtcIsoSeconds(new Date());
}

/** Two timestamps are the same instant when they parse to the same whole second. */
export function sameInstant(a: string, b: string): boolean {
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (Number.isNaN(left) || Number.isNaN(right)) return a === b;
  return Math.floor(left / 1000) === Math.floor(right / 1000);
}

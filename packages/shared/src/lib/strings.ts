export function coerceString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return "";
}

export function coerceTrimmedString(value: unknown): string {
  return coerceString(value).trim();
}

export function formatUnknown(value: unknown, fallback = ""): string {
  if (value instanceof Error && typeof value.message === "string") {
    const msg = value.message.trim();
    if (msg) return msg;
  }
  const primitive = coerceTrimmedString(value);
  if (primitive) return primitive;
  try {
    const encoded = JSON.stringify(value);
    if (typeof encoded === "string" && encoded !== "{}" && encoded !== "[]") return encoded;
  } catch {
    // unserializable values fall through to the fallback
  }
  return fallback;
}

export function splitLines(text: string): string[] {
  return coerceString(text)
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

export function lastLines(text: string, count: number): string[] {
  const lines = splitLines(text);
  return lines.slice(Math.max(0, lines.length - Math.max(0, Math.trunc(count))));
}

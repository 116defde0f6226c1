/**
 * Render a generated input for a failure message. Functions print as
 * `<function name>`, bigints with their `n` suffix, everything else as JSON.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "function") return `<function ${value.name || "anonymous"}>`;
  if (typeof value === "bigint") return `${value}n`;
  const json = JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? `${v}n` : typeof v === "function" ? "<function>" : v,
  );
  return json ?? String(value);
}

export const toSlug = (value: string): string => {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/(^-|-$)/g, "");
};

// Aave serializes BigDecimal fields as strings; older payloads use numbers.
// Anything that is not a finite number comes back as null.
export const parseNumeric = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  if (typeof value !== "string") return null;

  const trimmed = value.trim();

  if (!trimmed) return null;

  const num = Number(trimmed);

  return Number.isFinite(num) ? num : null;
};

// Same as parseNumeric but keeps the "∞" marker the API uses for accounts
// without debt.
export const parseHealthFactor = (value: unknown): number | null => {
  if (value === "∞" || value === Infinity) return Infinity;

  return parseNumeric(value);
};

export const sumBy = <T>(items: readonly T[], pick: (item: T) => number): number =>
  items.reduce((total, item) => total + pick(item), 0);

export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.slice(0, maxLength);
  return `${str.slice(0, maxLength - 3)}...`;
}

export function cleanCellText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parsePositiveInt(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1 ? value : undefined;
  }

  const digits = value.trim();
  if (!/^\d+$/.test(digits)) return undefined;
  const parsed = Number.parseInt(digits, 10);
  return parsed >= 1 ? parsed : undefined;
}

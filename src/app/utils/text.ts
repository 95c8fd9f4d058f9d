export function charLength(value: string): number {
  return Array.from(value).length;
}

export function padEndChars(value: string, width: number): string {
  const missing = width - charLength(value);
  return missing > 0 ? `${value}${" ".repeat(missing)}` : value;
}

export function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

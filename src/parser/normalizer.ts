export function normalize(expression: string): string {
  return expression.replace(/\s+/g, "");
}

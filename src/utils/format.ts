export function hex(offset: number): string {
  return `0x${offset.toString(16).toUpperCase()}`;
}

/** Network host (with port, if any) of a URL, or null when it does not parse. */
export function hostOf(url: string): string | null {
  try {
    return new URL(url).host || null;
  } catch {
    return null;
  }
}

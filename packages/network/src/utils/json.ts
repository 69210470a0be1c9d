// Unlimited pool sizes are Infinity, which JSON.stringify would turn into null.
function replaceNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value)
  }
  return value
}

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, replaceNonFinite, 2) : JSON.stringify(value, replaceNonFinite)
}

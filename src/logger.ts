export function log(message: string): void {
  const ts = new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  console.log(`[${ts}] ${message}`);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

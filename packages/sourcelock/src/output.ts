export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data));
}

export function outputError(
  error: string,
  message: string,
  exitCode: number,
): void {
  outputJson({ ok: false, error, message });
  process.stderr.write(`[sourcelock] Error: ${message}\n`);
  process.exit(exitCode);
}

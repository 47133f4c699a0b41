// Everything goes to stderr: stdout is reserved for the report.
export function createLogger(tag: string) {
  return {
    info: (msg: string) => console.error(`[${tag}] ${msg}`),
    warn: (msg: string) => console.warn(`[${tag}] ${msg}`),
  };
}

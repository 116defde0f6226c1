const PREFIX = "[laws]";

/** Verbose-mode output for law runs. Callers check `verbose` first. */
export function log(message: string): void {
  console.log(`${PREFIX} ${message}`);
}

// Process-wide readiness flags, read by the health probes and written by index.ts.

let ready = false;
let shuttingDown = false;

/** True once the server is listening AND storage is reachable. */
export function isReady(): boolean {
  return ready && !shuttingDown;
}

export function setReady(value: boolean): void {
  ready = value;
}

export function isShuttingDown(): boolean {
  return shuttingDown;
}

export function setShuttingDown(value: boolean): void {
  shuttingDown = value;
}

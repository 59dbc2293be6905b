import { ValidationError } from "../errors.js";
import type { Duration } from "../types/tasks.js";

const ISO = /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;

export function toMilliseconds(d: Duration): number {
  if (typeof d === "number") {
    if (!Number.isFinite(d) || d < 0) throw new ValidationError(`invalid duration ${d}`);
    return d;
  }
  if (typeof d === "string") {
    const m = ISO.exec(d.trim());
    if (!m || d.trim() === "P" || d.trim().toUpperCase() === "PT") throw new ValidationError(`invalid ISO-8601 duration '${d}'`);
    const [, days, hours, minutes, seconds] = m.map(x => (x === undefined ? 0 : Number(x)));
    return Math.round(((days * 24 + hours) * 60 + minutes) * 60_000 + seconds * 1000);
  }
  const { days = 0, hours = 0, minutes = 0, seconds = 0, milliseconds = 0 } = d;
  const total = (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000 + milliseconds;
  if (!Number.isFinite(total) || total < 0) throw new ValidationError(`invalid duration ${JSON.stringify(d)}`);
  return total;
}

/** Resolves after `ms`, or rejects with the signal's reason once aborted. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

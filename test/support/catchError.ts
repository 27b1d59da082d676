import { CursorError, WorldLoadError } from "../../src/wld/errors.js";

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  throw new Error("Expected an error to be thrown");
}

export function catchLoadError(fn: () => unknown): WorldLoadError {
  const e = catchError(fn);
  if (!(e instanceof WorldLoadError)) throw new Error(`Expected WorldLoadError, got ${String(e)}`);
  return e;
}

export function catchCursorError(fn: () => unknown): CursorError {
  const e = catchError(fn);
  if (!(e instanceof CursorError)) throw new Error(`Expected CursorError, got ${String(e)}`);
  return e;
}

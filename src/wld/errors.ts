export type LoadErrorKind =
  | "UnsupportedVersionTooNew"
  | "UnsupportedVersionTooOld"
  | "BadMagic"
  | "BadFileType"
  | "TruncatedData"
  | "DecompressionError"
  | "BadSectionOffset"
  | "CorruptData"
  | "Cancelled"
  | "IoError";

export type SectionName =
  | "header"
  | "tiles"
  | "chests"
  | "signs"
  | "npcs"
  | "entities"
  | "dummies"
  | "pressurePlates"
  | "townManager"
  | "bestiary"
  | "creativePowers";

export type LoadStage =
  | "io"
  | "validation"
  | "sectionTable"
  | "importance"
  | "playerOverlay"
  | SectionName;

export class WorldLoadError extends Error {
  public constructor(
    public readonly kind: LoadErrorKind,
    public readonly stage: LoadStage,
    message: string,
  ) {
    super(`[${stage}] ${kind}: ${message}`);
    this.name = "WorldLoadError";
  }
}

/**
 * Raised by the byte cursor. Carries no stage of its own; `atStage` re-tags it
 * with whichever decoder was reading when it surfaced.
 */
export class CursorError extends Error {
  public constructor(
    public readonly kind: "TruncatedData" | "CorruptData",
    message: string,
  ) {
    super(message);
    this.name = "CursorError";
  }
}

export function atStage<T>(stage: LoadStage, fn: () => T): T {
  try {
    return fn();
  } catch (e: unknown) {
    throw toLoadError(stage, e);
  }
}

export function toLoadError(stage: LoadStage, e: unknown): WorldLoadError {
  if (e instanceof WorldLoadError) return e;
  if (e instanceof CursorError) return new WorldLoadError(e.kind, stage, e.message);
  const msg = e instanceof Error ? e.message : String(e);
  return new WorldLoadError("CorruptData", stage, msg);
}

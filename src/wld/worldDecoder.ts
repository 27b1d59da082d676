import { ByteCursor } from "./binary.js";
import { emptyDefinitions, type Definitions } from "./definitions.js";
import {
  WorldLoadError,
  atStage,
  type LoadStage,
  type SectionName,
} from "./errors.js";
import { readWorldHeader, type HeaderTable, type WorldHeader } from "./header.js";
import {
  readBestiary,
  readChests,
  readEntities,
  readNpcs,
  readSigns,
  skipDummies,
  skipPressurePlates,
  skipTownManager,
  type SectionContext,
  type WarnFn,
} from "./sections.js";
import { TileGrid, decodeTile, emptyTile } from "./tile.js";
import { World, type Bestiary, type Chest, type Entity, type Npc, type Sign } from "./world.js";

export const MINIMUM_VERSION = 69;
export const HIGHEST_VERSION = 279;

export const MAGIC = "relogic";
export const FILE_TYPE_PLAYER_MAP = 1;
export const FILE_TYPE_WORLD = 2;

/** Tile columns decoded between returns to the event loop in `runAsync`. */
export const COLUMNS_PER_TURN = 64;

export type StatusFn = (msg: string) => void;

export type ProgressEvent = Readonly<{
  stage: "tiles";
  column: number;
  columns: number;
  percent: number;
}>;

export type ProgressFn = (event: ProgressEvent) => void;

export type DecodeOptions = Readonly<{
  headerTable: HeaderTable;
  definitions?: Definitions;
  onStatus?: StatusFn;
  onProgress?: ProgressFn;
  onWarn?: WarnFn;
  signal?: AbortSignal;
}>;

type DecoderState =
  | "readVersion"
  | "validateVersion"
  | "validateMagic"
  | "readSectionOffsets"
  | "readImportanceBitmap"
  | "dispatchSections"
  | "done";

type SectionStep = Readonly<{
  name: SectionName;
  slot: number;
  applies: (version: number) => boolean;
  status?: string;
}>;

// Fixed dispatch order. `slot` indexes the section-offset table.
const SECTION_PLAN: ReadonlyArray<SectionStep> = [
  { name: "header", slot: 0, applies: () => true },
  { name: "tiles", slot: 1, applies: () => true },
  { name: "chests", slot: 2, applies: () => true, status: "Loading chests..." },
  { name: "signs", slot: 3, applies: () => true, status: "Loading signs..." },
  { name: "npcs", slot: 4, applies: () => true, status: "Loading NPCs..." },
  { name: "dummies", slot: 5, applies: (v) => v >= 116 && v < 122 },
  { name: "entities", slot: 5, applies: (v) => v >= 122, status: "Loading entities..." },
  { name: "pressurePlates", slot: 6, applies: (v) => v >= 170 },
  { name: "townManager", slot: 7, applies: (v) => v >= 189 },
  { name: "bestiary", slot: 8, applies: (v) => v >= 210, status: "Loading bestiary..." },
  { name: "creativePowers", slot: 9, applies: (v) => v >= 220 },
];

export function sectionsFor(version: number): SectionName[] {
  return SECTION_PLAN.filter((s) => s.applies(version)).map((s) => s.name);
}

/**
 * Reads the magic, file-type, revision and favorites fields shared by world
 * and player-map files from version 135 on.
 */
export function readFileSignature(r: ByteCursor, expectedType: number, stage: LoadStage): void {
  const magic = atStage(stage, () => r.ascii(MAGIC.length));
  if (magic !== MAGIC) {
    throw new WorldLoadError("BadMagic", stage, `Expected '${MAGIC}' signature, found '${magic}'`);
  }
  const type = atStage(stage, () => r.u8());
  if (type !== expectedType) {
    const msg = `Expected file type ${expectedType}, found ${type}`;
    throw new WorldLoadError("BadFileType", stage, msg);
  }
  atStage(stage, () => r.skip(4 + 8)); // revision + favorites
}

/**
 * Single-pass decoder for one world stream. Each instance owns its cursor and
 * grid; run it once.
 */
export class WorldDecoder {
  private state: DecoderState = "readVersion";
  private readonly r: ByteCursor;
  private readonly ctx: SectionContext;

  private version = 0;
  private offsets: number[] = [];
  private framed: boolean[] = [];

  private header: WorldHeader | undefined;
  private grid: TileGrid | undefined;
  private chests: Chest[] = [];
  private signs: Sign[] = [];
  private npcs: Npc[] = [];
  private otherNpcs: Npc[] = [];
  private shimmered = new Set<number>();
  private entities: Entity[] = [];
  private bestiary: Bestiary = { kills: new Map(), sighted: new Set(), chats: new Set() };

  public constructor(
    bytes: Uint8Array,
    private readonly opts: DecodeOptions,
  ) {
    this.r = ByteCursor.from(bytes);
    this.ctx = {
      definitions: opts.definitions ?? emptyDefinitions(),
      warn: opts.onWarn ?? (() => {}),
    };
  }

  public run(): World {
    const steps = this.steps();
    for (;;) {
      const next = steps.next();
      if (next.done) return next.value;
    }
  }

  /**
   * Same decode as `run`, but yields to the event loop every `columnsPerTurn`
   * tile columns so an abort raised elsewhere lands at the next column.
   */
  public async runAsync(columnsPerTurn = COLUMNS_PER_TURN): Promise<World> {
    const steps = this.steps();
    let columns = 0;
    for (;;) {
      const next = steps.next();
      if (next.done) return next.value;
      if (++columns % columnsPerTurn === 0) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
  }

  // Yields once after each tile column.
  private *steps(): Generator<void, World, undefined> {
    for (;;) {
      switch (this.state) {
        case "readVersion":
          this.version = atStage("validation", () => this.r.u32());
          this.state = "validateVersion";
          break;

        case "validateVersion":
          if (this.version > HIGHEST_VERSION) {
            throw new WorldLoadError(
              "UnsupportedVersionTooNew",
              "validation",
              `Unsupported world version ${this.version} (highest known is ${HIGHEST_VERSION})`,
            );
          }
          if (this.version < MINIMUM_VERSION) {
            throw new WorldLoadError(
              "UnsupportedVersionTooOld",
              "validation",
              `World version ${this.version} is older than ${MINIMUM_VERSION}`,
            );
          }
          this.state = this.version >= 135 ? "validateMagic" : "readSectionOffsets";
          break;

        case "validateMagic":
          readFileSignature(this.r, FILE_TYPE_WORLD, "validation");
          this.state = "readSectionOffsets";
          break;

        case "readSectionOffsets":
          this.offsets = atStage("sectionTable", () => {
            const n = this.r.u16();
            const out: number[] = [];
            for (let i = 0; i < n; i++) out.push(this.r.u32());
            return out;
          });
          this.state = "readImportanceBitmap";
          break;

        case "readImportanceBitmap":
          this.framed = atStage("importance", () => this.r.bitmap(this.r.u16()));
          this.state = "dispatchSections";
          break;

        case "dispatchSections":
          for (const step of SECTION_PLAN) {
            if (!step.applies(this.version)) continue;
            this.checkCancelled(step.name);
            if (step.status) this.opts.onStatus?.(step.status);
            this.seekSection(step);
            const name = step.name;
            if (name === "tiles") yield* this.readTiles();
            else atStage(name, () => this.decodeSection(name));
          }
          this.state = "done";
          break;

        case "done":
          return this.finish();
      }
    }
  }

  private seekSection(step: SectionStep): void {
    const offset = this.offsets[step.slot];
    if (offset === undefined) {
      throw new WorldLoadError(
        "BadSectionOffset",
        step.name,
        `Section table has ${this.offsets.length} entries; ` +
          `version ${this.version} needs slot ${step.slot}`,
      );
    }
    if (offset > this.r.length()) {
      throw new WorldLoadError(
        "BadSectionOffset",
        step.name,
        `Section offset ${offset} is past the end of the ${this.r.length()}-byte stream`,
      );
    }
    this.r.seek(offset);
  }

  private decodeSection(name: Exclude<SectionName, "tiles">): void {
    const r = this.r;
    switch (name) {
      case "header":
        this.header = readWorldHeader(r, this.version, this.opts.headerTable);
        this.grid = this.allocateGrid(this.header);
        break;
      case "chests":
        this.chests = readChests(r, this.ctx);
        break;
      case "signs":
        this.signs = readSigns(r);
        break;
      case "npcs": {
        const s = readNpcs(r, this.version, this.ctx);
        this.npcs = s.npcs;
        this.otherNpcs = s.otherNpcs;
        this.shimmered = s.shimmered;
        break;
      }
      case "dummies":
        skipDummies(r);
        break;
      case "entities":
        this.entities = readEntities(r);
        break;
      case "pressurePlates":
        skipPressurePlates(r);
        break;
      case "townManager":
        skipTownManager(r);
        break;
      case "bestiary":
        this.bestiary = readBestiary(r);
        break;
      case "creativePowers":
        // Left unparsed; its offset is still checked.
        break;
    }
  }

  private allocateGrid(header: WorldHeader): TileGrid {
    const wide = header.number("tilesWide");
    const high = header.number("tilesHigh");
    if (wide === undefined || high === undefined || wide <= 0 || high <= 0) {
      throw new WorldLoadError("CorruptData", "header", `Invalid world dimensions ${wide}x${high}`);
    }
    return new TileGrid(wide, high);
  }

  // Column by column; a run repeats the record further down the same column.
  private *readTiles(): Generator<void, void, undefined> {
    const grid = this.requireGrid();
    const { width, height } = grid;
    const tile = emptyTile();

    for (let x = 0; x < width; x++) {
      this.checkCancelled("tiles");
      this.opts.onProgress?.({
        stage: "tiles",
        column: x,
        columns: width,
        percent: Math.floor((x * 100) / width),
      });

      let y = 0;
      while (y < height) {
        const rle = atStage("tiles", () => decodeTile(this.r, this.framed, tile));
        if (y + rle >= height) {
          throw new WorldLoadError(
            "CorruptData",
            "tiles",
            `Run of ${rle} at (${x},${y}) overflows column height ${height}`,
          );
        }
        let index = x + y * width;
        grid.store(index, tile);
        for (let k = 0; k < rle; k++) {
          index += width;
          grid.store(index, tile);
        }
        y += rle + 1;
      }
      yield;
    }
  }

  private requireGrid(): TileGrid {
    if (!this.grid) throw new WorldLoadError("CorruptData", "tiles", "Tile grid was not allocated");
    return this.grid;
  }

  private checkCancelled(stage: LoadStage): void {
    if (this.opts.signal?.aborted) {
      throw new WorldLoadError("Cancelled", stage, "Decode cancelled");
    }
  }

  private finish(): World {
    if (!this.header) throw new WorldLoadError("CorruptData", "header", "Header was not decoded");
    return new World({
      version: this.version,
      header: this.header,
      tiles: this.requireGrid(),
      chests: this.chests,
      signs: this.signs,
      npcs: this.npcs,
      otherNpcs: this.otherNpcs,
      shimmeredNpcs: this.shimmered,
      entities: this.entities,
      bestiary: this.bestiary,
    });
  }
}

export function decodeWorldBytes(bytes: Uint8Array, opts: DecodeOptions): World {
  return new WorldDecoder(bytes, opts).run();
}

export function decodeWorldBytesAsync(bytes: Uint8Array, opts: DecodeOptions): Promise<World> {
  return new WorldDecoder(bytes, opts).runAsync();
}

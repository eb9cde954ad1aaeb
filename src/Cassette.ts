import { CASSETTE_FORMAT_VERSION } from './constants.js';
import { InteractionNotFoundError } from './errors.js';
import { LiveRequest } from './LiveRequest.js';
import type { Fingerprinter, Interaction } from './types.js';
import { parseCassette, stringifyCassette } from './utils/cassetteFormat.js';
import {
  getCassettePath,
  readCassetteFile,
  writeCassetteFile,
} from './utils/fileUtils.js';
import { cloneInteraction } from './utils/clone.js';
import { defaultFingerprinter } from './utils/fingerprint.js';
import { Mutex } from './utils/lock.js';

export interface CassetteOptions {
  /**
   * Computes request fingerprints. Stored fingerprints are recomputed with it
   * on load, so a cassette recorded under other matching rules still replays.
   */
  fingerprinter?: Fingerprinter;
  /** Allow the same interaction to be returned any number of times */
  replayableInteractions?: boolean;
  compressionEnabled?: boolean;
  /**
   * When every interaction for a request was already replayed, fail the
   * lookup instead of reusing the most recently replayed one
   */
  strictReplay?: boolean;
}

/**
 * Recorded interactions for one cassette file, indexed by request
 * fingerprint. The interactions list and the index are only touched while
 * holding the cassette's lock.
 */
export class Cassette {
  readonly name: string;
  readonly version = CASSETTE_FORMAT_VERSION;
  readonly replayableInteractions: boolean;
  readonly strictReplay: boolean;
  compressionEnabled: boolean;
  /** False once the cassette has been loaded from disk */
  isNew = true;
  /** Some stored fingerprints were missing or stale on load; see upgrade() */
  needsUpgrade = false;

  private records: Interaction[] = [];
  private readonly index = new Map<string, number[]>();
  private readonly replayTicks = new WeakMap<Interaction, number>();
  private replayTick = 0;
  private readonly fingerprinter: Fingerprinter;
  private readonly lock = new Mutex();

  constructor(name: string, options: CassetteOptions = {}) {
    this.name = name;
    this.fingerprinter = options.fingerprinter ?? defaultFingerprinter;
    this.replayableInteractions = options.replayableInteractions ?? false;
    this.compressionEnabled = options.compressionEnabled ?? false;
    this.strictReplay = options.strictReplay ?? false;
  }

  static async load(name: string, options: CassetteOptions = {}): Promise<Cassette> {
    const cassette = new Cassette(name, options);
    await cassette.load();
    return cassette;
  }

  get file(): string {
    return getCassettePath(this.name, this.compressionEnabled);
  }

  get interactions(): readonly Interaction[] {
    return this.records;
  }

  async load(): Promise<void> {
    const file = this.file;
    const text = await readCassetteFile(file, this.compressionEnabled);
    const document = parseCassette(text, file);

    await this.lock.runExclusive(async () => {
      this.isNew = false;
      this.compressionEnabled =
        this.compressionEnabled || document.compressionEnabled;
      this.records = document.interactions;

      let recomputed = 0;
      for (const [position, interaction] of this.records.entries()) {
        interaction.id = position;
        const hash = await this.fingerprintRecorded(interaction);
        if (hash !== interaction.hash) {
          interaction.hash = hash;
          recomputed++;
        }
      }
      this.rebuildIndex();

      this.needsUpgrade = recomputed > 0;
      if (this.needsUpgrade) {
        console.log(
          `[CASSETTE] Recomputed ${recomputed} missing or stale fingerprints for ${file}`,
        );
      }
    });
  }

  /**
   * Rewrite a cassette whose fingerprints had to be recomputed on load, so
   * the file holds the current ones
   * @returns Whether the file was rewritten
   */
  async upgrade(): Promise<boolean> {
    if (!this.needsUpgrade) {
      return false;
    }
    await this.save();
    this.needsUpgrade = false;
    console.log(`[CASSETTE] Upgraded ${this.file}`);
    return true;
  }

  async addInteraction(interaction: Interaction): Promise<void> {
    await this.lock.runExclusive(async () => {
      const position = this.records.length;
      interaction.id = position;
      interaction.hash = await this.fingerprintRecorded(interaction);
      this.records.push(interaction);
      this.indexInteraction(interaction.hash, position);
    });
  }

  /**
   * Find the recorded interaction for a live request. The result is a copy
   * whose request body and form are the ones of the live request.
   */
  async getInteraction(request: LiveRequest): Promise<Interaction> {
    return this.lock.runExclusive(async () => {
      let hash: string;
      try {
        hash = await this.fingerprinter(request);
      } catch (error) {
        throw new Error('failed to hash request', { cause: error });
      }

      const bucket = this.index.get(hash);
      if (!bucket || bucket.length === 0) {
        throw new InteractionNotFoundError(hash);
      }

      const interaction = this.selectInteraction(bucket, hash);
      interaction.replayed = true;
      this.replayTicks.set(interaction, ++this.replayTick);

      return this.overrideRecordedRequestBody(request, interaction);
    });
  }

  async save(): Promise<void> {
    await this.lock.runExclusive(async () => {
      // Drop discarded interactions and renumber without gaps
      this.records = this.records.filter(
        (interaction) => !interaction.discardOnSave,
      );
      for (const [position, interaction] of this.records.entries()) {
        interaction.id = position;
      }
      this.rebuildIndex();

      const file = this.file;
      await writeCassetteFile(
        file,
        stringifyCassette(this.compressionEnabled, this.records),
        this.compressionEnabled,
      );
      console.log(`[CASSETTE] Saved ${this.records.length} interactions to ${file}`);
    });
  }

  private selectInteraction(bucket: number[], hash: string): Interaction {
    const candidates = bucket.map((position) => this.records[position]);

    if (this.replayableInteractions) {
      return candidates[0];
    }

    const unreplayed = candidates.find((interaction) => !interaction.replayed);
    if (unreplayed) {
      return unreplayed;
    }

    if (this.strictReplay) {
      throw new InteractionNotFoundError(hash);
    }

    const lastReplayed = candidates.reduce((latest, interaction) =>
      (this.replayTicks.get(interaction) ?? 0) >
      (this.replayTicks.get(latest) ?? 0)
        ? interaction
        : latest,
    );
    console.warn(
      `[REPLAY WARNING] All ${candidates.length} interactions already replayed for ${lastReplayed.request.method} ${lastReplayed.request.url} (cassette: ${this.name}), reusing interaction ${lastReplayed.id}`,
    );
    return lastReplayed;
  }

  private async overrideRecordedRequestBody(
    request: LiveRequest,
    interaction: Interaction,
  ): Promise<Interaction> {
    const copy = cloneInteraction(interaction);
    copy.request.body = Buffer.from(await request.bytes());
    copy.request.form = { ...(await request.parseForm()) };
    return copy;
  }

  private async fingerprintRecorded(interaction: Interaction): Promise<string> {
    try {
      return await this.fingerprinter(LiveRequest.fromRecorded(interaction.request));
    } catch (error) {
      throw new Error(
        `failed to hash request for interaction ${interaction.id}`,
        { cause: error },
      );
    }
  }

  private rebuildIndex(): void {
    this.index.clear();
    for (const [position, interaction] of this.records.entries()) {
      this.indexInteraction(interaction.hash, position);
    }
  }

  private indexInteraction(hash: string, position: number): void {
    const bucket = this.index.get(hash);
    if (bucket) {
      bucket.push(position);
    } else {
      this.index.set(hash, [position]);
    }
  }
}

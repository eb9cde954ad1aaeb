import type http from 'node:http';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  type CapturedExchange,
  createCaptureMiddleware,
} from './adapters/middleware.js';
import { createRecorderFetch, type RecorderFetch } from './adapters/fetch.js';
import { Cassette, type CassetteOptions } from './Cassette.js';
import { resolveMode } from './config.js';
import { SAFE_METHODS } from './constants.js';
import {
  CassetteNotFoundError,
  InteractionNotFoundError,
  UnsafeMethodError,
} from './errors.js';
import type { LiveRequest } from './LiveRequest.js';
import { nodeTransport } from './transport/nodeTransport.js';
import {
  type Fingerprinter,
  type Hook,
  type HookFunc,
  type HookKind,
  HookKinds,
  type Interaction,
  type Mode,
  Modes,
  type PassthroughFunc,
  type RealTransport,
  type RecordedRequest,
  type RoundTripper,
  type TransportResponse,
} from './types.js';
import { cloneResponse } from './utils/clone.js';
import { createFingerprinter } from './utils/fingerprint.js';

export interface RecorderOptions {
  /** Cassette name; the file is `{cassetteName}.yaml` */
  cassetteName: string;
  /** Defaults to HTTP_CASSETTE_MODE, then record-once */
  mode?: Mode | string;
  realTransport?: RealTransport;
  fingerprinter?: Fingerprinter;
  /** Header names the default fingerprinter leaves out */
  ignoreHeaders?: string[];
  passthroughs?: PassthroughFunc[];
  hooks?: Hook[];
  /** Refuse to send anything but GET, HEAD, OPTIONS and TRACE for real */
  blockUnsafeMethods?: boolean;
  replayableInteractions?: boolean;
  strictReplay?: boolean;
  /** Store the cassette gzip-compressed as `{cassetteName}.yaml.gz` */
  compression?: boolean;
  /** Delay each replayed response by its recorded duration */
  simulateLatency?: boolean;
  /** Rewrite a cassette whose fingerprints were recomputed on load */
  upgradeLegacyCassette?: boolean;
}

async function openCassette(
  mode: Mode,
  name: string,
  options: CassetteOptions,
): Promise<Cassette> {
  switch (mode) {
    case Modes.recordOnly:
    case Modes.passthrough: {
      return new Cassette(name, options);
    }
    case Modes.replayOnly: {
      return Cassette.load(name, options);
    }
    case Modes.recordOnce:
    case Modes.replayWithNewEpisodes: {
      try {
        return await Cassette.load(name, options);
      } catch (error) {
        if (error instanceof CassetteNotFoundError) {
          return new Cassette(name, options);
        }
        throw error;
      }
    }
  }
}

/**
 * Sits between the code under test and the network: replays recorded
 * interactions from a cassette, records new ones through the real transport,
 * or passes requests straight through, depending on the mode.
 */
export class Recorder implements RoundTripper {
  readonly fetch: RecorderFetch;

  private readonly hooks: Hook[];
  private readonly passthroughs: PassthroughFunc[];
  private pendingCaptures: Promise<void>[] = [];
  private captureErrors: unknown[] = [];

  private constructor(
    private readonly currentMode: Mode,
    private readonly currentCassette: Cassette,
    private readonly realTransport: RealTransport,
    private readonly options: RecorderOptions,
  ) {
    this.hooks = [...(options.hooks ?? [])];
    this.passthroughs = [...(options.passthroughs ?? [])];
    this.fetch = createRecorderFetch(this);
  }

  static async create(options: RecorderOptions): Promise<Recorder> {
    const mode = resolveMode(options.mode);
    const fingerprinter =
      options.fingerprinter ??
      createFingerprinter({ ignoreHeaders: options.ignoreHeaders });

    const cassette = await openCassette(mode, options.cassetteName, {
      fingerprinter,
      replayableInteractions: options.replayableInteractions,
      strictReplay: options.strictReplay,
      compressionEnabled: options.compression,
    });

    if (options.upgradeLegacyCassette !== false) {
      await cassette.upgrade();
    }

    return new Recorder(
      mode,
      cassette,
      options.realTransport ?? nodeTransport,
      options,
    );
  }

  get cassette(): Cassette {
    return this.currentCassette;
  }

  mode(): Mode {
    return this.currentMode;
  }

  isNewCassette(): boolean {
    return this.currentCassette.isNew;
  }

  isRecording(): boolean {
    switch (this.currentMode) {
      case Modes.recordOnly:
      case Modes.replayWithNewEpisodes: {
        return true;
      }
      case Modes.recordOnce: {
        return this.currentCassette.isNew;
      }
      default: {
        return false;
      }
    }
  }

  addHook(fn: HookFunc, kind: HookKind): void {
    this.hooks.push({ kind, fn });
  }

  addPassthrough(fn: PassthroughFunc): void {
    this.passthroughs.push(fn);
  }

  async roundTrip(request: LiveRequest): Promise<TransportResponse> {
    if (await this.isPassthrough(request)) {
      return this.realTransport(request);
    }

    if (this.options.blockUnsafeMethods && !SAFE_METHODS.has(request.method)) {
      throw new UnsafeMethodError(request.method);
    }

    if (this.currentMode === Modes.passthrough) {
      return this.realTransport(request);
    }

    let miss: InteractionNotFoundError | null = null;
    if (this.canReplay()) {
      try {
        const interaction = await this.currentCassette.getInteraction(request);
        return await this.replay(request, interaction);
      } catch (error) {
        if (!(error instanceof InteractionNotFoundError)) {
          throw error;
        }
        miss = error;
      }
    }

    if (!this.isRecording()) {
      throw miss ?? new InteractionNotFoundError('');
    }

    return this.record(request);
  }

  /**
   * Wrap a request listener so that, while recording, every exchange it
   * serves is stored in the cassette. Captures finish in the background;
   * stop() waits for them.
   */
  middleware(handler: http.RequestListener): http.RequestListener {
    const capture = createCaptureMiddleware(handler, (exchange) => {
      this.pendingCaptures.push(this.storeCapture(exchange));
    });

    return (req, res) => {
      if (!this.isRecording()) {
        handler(req, res);
        return;
      }
      capture(req, res);
    };
  }

  /**
   * Finish the session: wait for background captures, run before-save
   * hooks, save the cassette when recording, then run on-recorder-stop hooks
   */
  async stop(): Promise<void> {
    await this.flushPendingCaptures();

    await this.runHooks(HookKinds.beforeSave, this.currentCassette.interactions);

    if (this.isRecording()) {
      await this.currentCassette.save();
    }

    await this.runHooks(
      HookKinds.onRecorderStop,
      this.currentCassette.interactions,
    );

    const [firstCaptureError] = this.captureErrors;
    this.captureErrors = [];
    if (firstCaptureError !== undefined) {
      throw firstCaptureError;
    }
  }

  // A fresh record-once cassette still answers repeats of what it just recorded
  private canReplay(): boolean {
    return this.currentMode !== Modes.recordOnly;
  }

  private async isPassthrough(request: LiveRequest): Promise<boolean> {
    for (const passthrough of this.passthroughs) {
      if (await passthrough(request)) {
        return true;
      }
    }
    return false;
  }

  private async replay(
    request: LiveRequest,
    interaction: Interaction,
  ): Promise<TransportResponse> {
    await this.runHooks(HookKinds.beforeResponseReplay, [interaction]);

    const { duration, ...response } = interaction.response;
    if (this.options.simulateLatency && duration > 0) {
      await sleep(duration, undefined, { signal: request.signal });
    }
    return response;
  }

  private async record(request: LiveRequest): Promise<TransportResponse> {
    const started = performance.now();
    const response = await this.realTransport(request);
    const duration = performance.now() - started;

    await this.capture(await request.snapshot(), response, duration);
    return response;
  }

  private async capture(
    request: RecordedRequest,
    response: TransportResponse,
    duration: number,
  ): Promise<void> {
    const interaction: Interaction = {
      id: -1,
      hash: '',
      request,
      response: { ...cloneResponse(response), duration: Math.round(duration) },
      discardOnSave: false,
      replayed: false,
    };

    await this.runHooks(HookKinds.afterCapture, [interaction]);
    await this.currentCassette.addInteraction(interaction);
  }

  private async storeCapture(exchange: Promise<CapturedExchange>): Promise<void> {
    try {
      const { request, response, duration } = await exchange;
      if (await this.isPassthrough(request)) {
        return;
      }
      await this.capture(await request.snapshot(), response, duration);
    } catch (error) {
      console.error('[CAPTURE ERROR] Failed to store exchange:', error);
      this.captureErrors.push(error);
    }
  }

  private async flushPendingCaptures(): Promise<void> {
    if (this.pendingCaptures.length === 0) {
      return;
    }
    const pending = this.pendingCaptures;
    this.pendingCaptures = [];
    await Promise.allSettled(pending);
  }

  private async runHooks(
    kind: HookKind,
    interactions: readonly Interaction[],
  ): Promise<void> {
    const chain = this.hooks.filter((hook) => hook.kind === kind);
    if (chain.length === 0) {
      return;
    }
    for (const interaction of interactions) {
      for (const hook of chain) {
        await hook.fn(interaction);
      }
    }
  }
}

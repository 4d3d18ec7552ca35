/**
 * Source Registry: which sources exist and which are loaded.
 *
 * "Available" sources are discovered descriptors that may not be
 * instantiated yet; "loaded" sources are instantiated, subscribed to the
 * bus and controllable through a SourceHandle. Capabilities are read once
 * at registration and cached on the handle.
 */

import type {
  Capability,
  MaybePromise,
  MediaSource,
  PlayerEvents,
  PlayerEventType,
  SourceContext,
  SourceDescriptor,
  SourcePlayback,
  TransportOperation,
} from "../types/index.js";
import {
  SOURCE_CHANGED,
  STATE_CHANGED,
  TRACK_CHANGED,
  VOLUME_CHANGED,
} from "../types/index.js";
import { EngineError, SourceUnavailableError, toEngineError } from "./errors.js";
import type { EventHandler, PlayerEventBus } from "./event-bus.js";
import { createLogger, describeError } from "./logger.js";
import type { Logger } from "./logger.js";
import { settlesWithin } from "./timing.js";

// ── Capabilities ────────────────────────────────────────────────────

export const CAPABILITY_BITS: Record<Capability, number> = {
  play: 1 << 0,
  pause: 1 << 1,
  stop: 1 << 2,
  next: 1 << 3,
  prev: 1 << 4,
  setVolume: 1 << 5,
  queryPlayback: 1 << 6,
  shutdown: 1 << 7,
};

const CAPABILITIES: readonly Capability[] = [
  "play",
  "pause",
  "stop",
  "next",
  "prev",
  "setVolume",
  "queryPlayback",
  "shutdown",
];

type TransportFn = (args: readonly string[]) => MaybePromise<boolean>;

/** Bound operations a source implements. Absent keys are unsupported. */
interface SourceOperations {
  play?: TransportFn;
  pause?: TransportFn;
  stop?: TransportFn;
  next?: TransportFn;
  prev?: TransportFn;
  setVolume?: (level: number) => MaybePromise<boolean>;
  queryPlayback?: () => MaybePromise<SourcePlayback | null>;
  shutdown?: () => MaybePromise<void>;
}

function bindOperations(source: MediaSource): SourceOperations {
  return {
    play: source.play?.bind(source),
    pause: source.pause?.bind(source),
    stop: source.stop?.bind(source),
    next: source.next?.bind(source),
    prev: source.prev?.bind(source),
    setVolume: source.setVolume?.bind(source),
    queryPlayback: source.getCurrentPlayback?.bind(source),
    shutdown: source.onShutdown?.bind(source),
  };
}

function capabilityMask(ops: SourceOperations): number {
  let mask = 0;
  for (const capability of CAPABILITIES) {
    if (ops[capability] !== undefined) mask |= CAPABILITY_BITS[capability];
  }
  return mask;
}

/**
 * Uniform, capability-checked access to one loaded source. Failures from
 * the source surface as EngineError.
 */
export class SourceHandle {
  readonly name: string;
  readonly displayName: string;
  readonly capabilities: number;
  private readonly ops: SourceOperations;

  constructor(readonly source: MediaSource) {
    this.name = source.name;
    this.displayName = source.displayName ?? source.name;
    this.ops = bindOperations(source);
    this.capabilities = capabilityMask(this.ops);
  }

  supports(capability: Capability): boolean {
    return (this.capabilities & CAPABILITY_BITS[capability]) !== 0;
  }

  /** Run a transport operation. Throws EngineError when unsupported or when the source fails. */
  async invoke(operation: TransportOperation, args: readonly string[] = []): Promise<boolean> {
    const fn = this.ops[operation];
    if (!fn) {
      throw new EngineError(`${this.displayName} does not support ${operation}`, {
        source: this.name,
        operation,
      });
    }
    try {
      return await fn(args);
    } catch (err) {
      throw toEngineError(err, `${this.displayName} failed to ${operation}`, {
        source: this.name,
        operation,
      });
    }
  }

  async setVolume(level: number): Promise<boolean> {
    const fn = this.ops.setVolume;
    if (!fn) return false;
    try {
      return await fn(level);
    } catch (err) {
      throw toEngineError(err, `${this.displayName} failed to set volume`, { source: this.name });
    }
  }

  /** The source's own report, or null when it cannot tell. */
  async queryPlayback(): Promise<SourcePlayback | null> {
    const fn = this.ops.queryPlayback;
    if (!fn) return null;
    try {
      return await fn();
    } catch (err) {
      throw toEngineError(err, `${this.displayName} failed to report playback`, { source: this.name });
    }
  }

  async shutdown(): Promise<void> {
    const fn = this.ops.shutdown;
    if (!fn) return;
    try {
      await fn();
    } catch (err) {
      throw toEngineError(err, `${this.displayName} failed to shut down`, { source: this.name });
    }
  }
}

// ── Registry ────────────────────────────────────────────────────────

/** Forces a source out of playback before it is unloaded. Implemented by the orchestrator. */
export interface SourceReleaser {
  releaseSource(name: string): Promise<void>;
}

export interface AvailableSource {
  name: string;
  displayName: string;
  loaded: boolean;
}

export interface SourceRegistryOptions {
  bus: PlayerEventBus;
  /** The default source, which can never be unregistered. Default: "local" */
  localSourceName?: string;
  /** Longest wait for a source's shutdown hook on unregister. Default: 2000 */
  shutdownTimeoutMs?: number;
  logger?: Logger;
}

export class SourceRegistry {
  private readonly descriptors = new Map<string, SourceDescriptor>();
  private readonly handles = new Map<string, SourceHandle>();
  /** Unsubscribe callbacks for each source's hooks */
  private readonly hookSubscriptions = new Map<string, Array<() => void>>();
  private readonly bus: PlayerEventBus;
  private readonly logger: Logger;
  private readonly shutdownTimeoutMs: number;
  private releaser: SourceReleaser | null = null;
  readonly localSourceName: string;

  constructor(options: SourceRegistryOptions) {
    this.bus = options.bus;
    this.localSourceName = options.localSourceName ?? "local";
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 2_000;
    this.logger = options.logger ?? createLogger("source-registry");
  }

  /** Wire the component that releases active sources on unregister. */
  setReleaser(releaser: SourceReleaser): void {
    this.releaser = releaser;
  }

  // ── Discovery ────────────────────────────────────────────────────

  discover(descriptor: SourceDescriptor): void {
    this.descriptors.set(descriptor.name, descriptor);
  }

  /** The descriptor is no longer discoverable. A loaded instance stays loaded. */
  forget(name: string): boolean {
    return this.descriptors.delete(name);
  }

  listAvailable(): AvailableSource[] {
    return [...this.descriptors.values()].map((descriptor) => ({
      name: descriptor.name,
      displayName: descriptor.displayName ?? descriptor.name,
      loaded: this.handles.has(descriptor.name),
    }));
  }

  listLoaded(): string[] {
    return [...this.handles.keys()];
  }

  // ── Loading ──────────────────────────────────────────────────────

  /** Instantiate an available source and register it. */
  load(name: string, context: SourceContext): SourceHandle | null {
    if (this.handles.has(name)) {
      this.logger.info({ source: name }, "Source already loaded");
      return this.handles.get(name) ?? null;
    }
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      const error = new SourceUnavailableError(name, `Source ${name} is not available`);
      this.logger.warn({ source: name }, error.message);
      return null;
    }
    try {
      return this.register(descriptor.create(context));
    } catch (err) {
      this.logger.error({ source: name, err: describeError(err) }, `Failed to load source ${name}`);
      return null;
    }
  }

  /** Register an instantiated source and subscribe its hooks. */
  register(source: MediaSource): SourceHandle {
    if (this.handles.has(source.name)) {
      throw new EngineError(`Source ${source.name} is already registered`, { source: source.name });
    }
    const handle = new SourceHandle(source);
    this.handles.set(source.name, handle);
    this.hookSubscriptions.set(source.name, this.subscribeHooks(source));
    this.logger.info(
      { source: source.name, capabilities: handle.capabilities },
      `Registered source ${handle.displayName}`,
    );
    return handle;
  }

  /**
   * Unload a source: release it if it is the active one, run its shutdown
   * hook (bounded), drop its subscriptions, then remove it from the loaded
   * set. It stays available while its descriptor is discovered.
   */
  async unregister(name: string): Promise<boolean> {
    if (name === this.localSourceName) {
      this.logger.warn({ source: name }, "The local source cannot be unregistered");
      return false;
    }
    if (!this.handles.has(name)) {
      this.logger.info({ source: name }, `Source ${name} is not loaded`);
      return false;
    }

    if (this.releaser) {
      await this.releaser.releaseSource(name);
    }

    const handle = this.handles.get(name);
    if (handle?.supports("shutdown")) {
      const notified = handle.shutdown().catch((err: unknown) => {
        this.logger.warn({ source: name, err: describeError(err) }, `${handle.displayName} failed to shut down`);
      });
      if (!(await settlesWithin(notified, this.shutdownTimeoutMs))) {
        this.logger.warn(
          { source: name, timeoutMs: this.shutdownTimeoutMs },
          `${handle.displayName} did not finish shutting down`,
        );
      }
    }

    for (const unsubscribe of this.hookSubscriptions.get(name) ?? []) {
      unsubscribe();
    }
    this.hookSubscriptions.delete(name);
    this.handles.delete(name);
    this.logger.info({ source: name }, `Unregistered source ${name}`);
    return true;
  }

  // ── Lookup ───────────────────────────────────────────────────────

  get(name: string): SourceHandle | null {
    return this.handles.get(name) ?? null;
  }

  require(name: string): SourceHandle {
    const handle = this.handles.get(name);
    if (!handle) throw new SourceUnavailableError(name);
    return handle;
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  /** Loaded handles, in registration order. */
  all(): SourceHandle[] {
    return [...this.handles.values()];
  }

  // ── Internal ─────────────────────────────────────────────────────

  private subscribeHooks(source: MediaSource): Array<() => void> {
    const subscriptions: Array<() => void> = [];
    const add = <K extends PlayerEventType>(
      eventType: K,
      hook: ((event: PlayerEvents[K]) => MaybePromise<void>) | undefined,
    ): void => {
      if (!hook) return;
      const handler: EventHandler<PlayerEvents[K]> = (event) => hook.call(source, event);
      this.bus.subscribe(eventType, handler);
      subscriptions.push(() => {
        this.bus.unsubscribe(eventType, handler);
      });
    };

    add(STATE_CHANGED, source.onStateChanged);
    add(TRACK_CHANGED, source.onTrackChanged);
    add(SOURCE_CHANGED, source.onSourceChanged);
    add(VOLUME_CHANGED, source.onVolumeChanged);
    return subscriptions;
  }
}

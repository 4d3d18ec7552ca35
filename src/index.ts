export { Player } from "./core/player.js";
export type { PlayerOptions, LoadPlaylistOptions } from "./core/player.js";
export { PlaybackOrchestrator } from "./core/orchestrator.js";
export type { PlaybackOrchestratorOptions } from "./core/orchestrator.js";
export { PlayerStateMachine } from "./core/state-machine.js";
export { TrackNavigator } from "./core/track-navigator.js";
export type { NavigationCursor, TrackNavigatorOptions } from "./core/track-navigator.js";
export { Playlist } from "./core/playlist.js";
export { EventBus } from "./core/event-bus.js";
export type { EventHandler, EventBusOptions, PlayerEventBus } from "./core/event-bus.js";
export { SourceRegistry, SourceHandle, CAPABILITY_BITS } from "./core/source-registry.js";
export type { AvailableSource } from "./core/source-registry.js";
export { PlaybackInfoStore } from "./core/playback-info.js";
export { WatchdogLoop } from "./core/watchdog.js";
export { configFromEnv, resolveConfig, PlayerConfigSchema } from "./core/config.js";
export type { PlayerConfig, PlayerConfigInput } from "./core/config.js";
export {
  PlaybackError,
  EngineError,
  SourceUnavailableError,
  NavigationError,
  SubscriberError,
  TransitionError,
  ConfigError,
} from "./core/errors.js";
export type { CommandResult, PlaybackErrorCode } from "./core/errors.js";
export { createLogger, logger } from "./core/logger.js";
export { LocalSource } from "./sources/local-source.js";
export { RemoteSource } from "./sources/remote-source.js";
export { FfplayEngine } from "./engine/ffplay-engine.js";
export type { FfplayEngineOptions } from "./engine/ffplay-engine.js";
export { StatusView, formatDuration } from "./ui/status-view.js";
export type { PlayerStatus, ControlsInfo, ProgressInfo, PlaylistEntry } from "./ui/status-view.js";
export * from "./types/index.js";

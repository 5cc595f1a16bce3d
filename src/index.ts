export type { Interval, IntervalColumn, SortDirection, TimestampRecord } from './types/timestamp';
export type { EndBound, Highlight, LoopPhase, MediaPlayer } from './types/player';

export { createTimestampStore, subscribeToEdits } from './stores/timestamp-store';
export type { EditListeners, TimestampState, TimestampStore, TimestampStoreOptions } from './stores/timestamp-store';
export { createLoopController } from './stores/loop-store';
export type { LoopController, LoopControllerOptions, LoopState } from './stores/loop-store';
export { createSettingsStore, DEFAULT_SETTINGS, settingsSchema } from './stores/settings-store';
export type { Settings, SettingsStore } from './stores/settings-store';

export { parseIntervalList, serializeIntervalList, sortIntervals } from './services/timestamps/interval-list';
export { parseLegacyFile, parseLegacyLine, parseLegacyLineAt } from './services/timestamps/legacy-parser';
export { createFileSource, createMemorySource } from './services/file-system/timestamp-source';
export type { TimestampSource } from './services/file-system/timestamp-source';
export { createFileStorage, defaultSettingsPath } from './services/file-system/settings-storage';
export { findCompanionVideo } from './services/file-system/companion-finder';
export { startTicker, waitForDuration } from './services/playback/ticker';
export { createMediaElementPlayer } from './services/player/media-element-player';
export type { MediaElementLike } from './services/player/media-element-player';
export { createVlcRcPlayer } from './services/player/vlc-rc-player';
export type { VlcRcPlayer, VlcRcPlayerOptions } from './services/player/vlc-rc-player';
export { buildLoopArgs, launchVlcLoop } from './services/player/vlc-launcher';

export { FormatError, InvalidIntervalError, IOError, LooperError, NotReadyError } from './utils/errors';
export type { Result } from './utils/errors';
export { formatTimeOffset, parseTimeOffset } from './utils/time';

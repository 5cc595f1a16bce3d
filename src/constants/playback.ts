export const TIMER_PERIOD_MS = 100; // tick period for restart + progress updates

export const VOLUME_MIN = 0;
export const VOLUME_CEILING = 40; // app ceiling, not a hardware limit
export const DEFAULT_VOLUME = 20;

export const RATE_MIN = 0.2;
export const RATE_MAX = 2.0;
export const RATE_STEP = 0.1;

export const TIMESTAMP_HEADERS = ['Start Time', 'End Time', 'Description'] as const;

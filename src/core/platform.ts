/**
 * Platform compatibility layer.
 *
 * Detects the runtime platform and provides the UTC clock and timestamp
 * helpers the scheduler compares against.
 */

/** Detected platform. */
export type Platform = 'linux' | 'macos' | 'windows' | 'unknown';

/** Detect the current platform. */
export function detectPlatform(platform: NodeJS.Platform = process.platform): Platform {
  switch (platform) {
    case 'linux': return 'linux';
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return 'unknown';
  }
}

/** Cached platform value. */
export const PLATFORM: Platform = detectPlatform();

/** Source of the current instant. Injected so due checks are testable. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock frozen at one instant. */
export function fixedClock(instant: Date): Clock {
  return { now: () => new Date(instant.getTime()) };
}

/** Serialize an instant as ISO 8601 UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Parse a stored timestamp. Returns null for absent or unparsable values
 * (which the scheduler treats as "never ran").
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Milliseconds elapsed from `since` to `now`. */
export function elapsedMs(since: Date, now: Date): number {
  return now.getTime() - since.getTime();
}

/** Minimum required Node.js major version. */
export const MINIMUM_NODE_MAJOR = 20;

/** Get Node.js version info. */
export function getNodeVersionInfo(versionString: string = process.version): {
  version: string;
  major: number;
  meetsMinimum: boolean;
} {
  const version = versionString.replace('v', '');
  const [major = 0] = version.split('.').map(Number);

  return {
    version,
    major,
    meetsMinimum: major >= MINIMUM_NODE_MAJOR,
  };
}

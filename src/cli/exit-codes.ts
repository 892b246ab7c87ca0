import type { FatalKind } from '../core/errors.js';

/**
 * Process exit codes. Advisory findings (image size, resource sampling) never
 * change the exit code.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  BUILD_FAILED: 2,
  LAUNCH_FAILED: 3,
  READINESS_TIMEOUT: 4,
  INVALID_CONFIG: 5,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(kind: FatalKind): ExitCode {
  switch (kind) {
    case 'build_failed':
      return EXIT.BUILD_FAILED;
    case 'launch_failed':
      return EXIT.LAUNCH_FAILED;
    case 'readiness_timeout':
      return EXIT.READINESS_TIMEOUT;
    case 'cancelled':
      return EXIT.CANCELLED;
    case 'unexpected':
      return EXIT.FAILURE;
  }
}

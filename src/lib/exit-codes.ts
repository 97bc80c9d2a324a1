/** Process exit codes for `provision` commands. */
export const EXIT = {
  SUCCESS: 0,
  STOPPED: 1,
  INTERRUPTED: 2,
  INVALID: 3,
  FORCE_QUIT: 130,
} as const;

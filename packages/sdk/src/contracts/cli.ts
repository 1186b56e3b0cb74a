/**
 * CLI contracts and exit codes
 */

/**
 * Standard exit codes
 */
export const EXIT_CODE = {
  /** Success, including deferred (null) queries */
  SUCCESS: 0,
  /** Internal error */
  INTERNAL_ERROR: 1,
  /** Query rejected by the validator */
  INVALID_QUERY: 2,
  /** Invalid arguments or unreadable input */
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/**
 * CLI invariants:
 *
 * 1. Exit codes:
 *    - 0: query valid or deferred
 *    - 1: internal error (unexpected error, bug)
 *    - 2: query rejected (first violation printed to stderr)
 *    - 3: invalid arguments, unreadable file or malformed JSON
 *
 * 2. Output format:
 *    - Normalized queries are printed as stable JSON (sorted keys)
 *    - --raw prints single-line JSON
 *    - Errors always go to stderr
 *
 * 3. Environment:
 *    - QSHAPE_MAX_DEPTH, QSHAPE_SYSTEM_NAMESPACES: validator defaults
 *    - QSHAPE_CLI_DEBUG=1: timing metrics on stderr
 *    - Flags take precedence over environment
 */

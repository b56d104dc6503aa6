/**
 * Global setup for the Vitest environment.
 *
 * Silences the diagnostic Logger unless OPTCB_DEBUG is set, so that test
 * output only carries what the tests themselves print.
 */

if (process.env.OPTCB_DEBUG !== '1' && process.env.OPTCB_QUIET === undefined) {
  process.env.OPTCB_QUIET = '1'
}

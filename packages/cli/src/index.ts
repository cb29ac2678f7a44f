/**
 * @brdocs/cli
 *
 * @packageDocumentation
 */

export { run, describeResult, USAGE, EXIT_VALID, EXIT_INVALID, EXIT_USAGE, type CliIo } from './cli.js';

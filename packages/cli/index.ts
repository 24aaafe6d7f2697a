/**
 * @conform/cli
 *
 * Command implementations behind the `conform` binary.
 */

export { type CheckOptions, type CheckOutcome, checkCommand, runCheck } from "./commands/check"
export { type DescribeOutcome, describeCommand, runDescribe } from "./commands/describe"
export { formatCliError, printError } from "./commands/outcome"
export { loadEnvOptions } from "./env"
export { parseJson, readJsonFile } from "./io"
export { formatJson, toJsonValue } from "./output"
export type { CliError, IoError, OptionsError, ParseError, UsageError } from "./types/errors"

/**
 * @recoll-search/client
 * Recollインデックスへの接続（recollq経由）
 */

export {
  connectIndex,
  RecollqConnection,
  RecollqQuery,
  type RecollqConnectionOptions,
} from './recollq-connection.js';
export { parseRecollqOutput, parseRecollqPage, parseHitLine, RECOLLQ_FIELDS, type ParsedRecollqOutput } from './output-parser.js';
export { spawnCommand, type CommandRunner, type CommandResult } from './command-runner.js';
export { IndexConnectError, RecollQueryError } from './errors.js';

/**
 * Pino redaction for file and string payloads.
 *
 * Transfers can carry arbitrary user bytes; only lengths and ids are logged.
 */
export const REDACTION_CONFIG = {
  paths: ['buffer', 'data', 'chunk', '*.buffer', '*.data', '*.chunk', 'args[*].buffer'],
  censor: '[bytes]',
};

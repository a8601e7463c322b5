/**
 * Redaction configuration for pino.
 *
 * Pool state predicts every future extraction until the next independent feed,
 * so raw buffers and seeds never reach a log line.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Top-level sensitive fields
    'buffer',
    'seed',
    'key',
    'output',

    // One level nested (*.field)
    '*.buffer',
    '*.seed',
    '*.key',
    '*.output',

    // Exported pool state
    'state.buffer',
    'err.state.buffer',
  ],
  censor: '[REDACTED]',
};

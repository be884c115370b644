/**
 * Redaction configuration for pino.
 *
 * Remote-scheme URLs and adapter options can carry credentials
 * (`user:password@host`), so those fields never reach the log stream.
 */
export const REDACTION_CONFIG = {
  paths: [
    'password',
    'token',
    'secret',
    'authorization',

    '*.password',
    '*.token',
    '*.secret',

    'url.password',
    'adapterOptions.*.password',
    'adapterOptions.*.token',

    'err.options.password',
  ] as string[], // mutable for pino
  censor: '[REDACTED]',
};

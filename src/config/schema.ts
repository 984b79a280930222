/**
 * JSON schema of the YAML config file. Only shapes and types are checked here;
 * value ranges are checked by validateConfig() once flags are merged in.
 */
export const ConfigFileSchema = {
  type: 'object',
  properties: {
    dryRun: { type: 'boolean' },
    concurrency: { type: 'integer' },
    verbosity: { type: 'string', enum: ['quiet', 'verbose', 'debug'] },
    store: {
      type: 'object',
      properties: {
        region: { type: 'string' },
        endpoint: { type: 'string', format: 'uri' },
        accessKeyId: { type: 'string' },
        secretAccessKey: { type: 'string' },
        forcePathStyle: { type: 'boolean' },
        preserveAcl: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    checks: {
      type: 'object',
      properties: {
        contentType: { type: 'boolean' },
        cacheControl: { type: 'boolean' },
        imageOptimisation: { type: 'boolean' },
        gzip: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    cache: {
      type: 'object',
      properties: {
        visibility: { type: 'string', enum: ['public', 'private'] },
        imageMaxAge: { type: 'integer' },
        textMaxAge: { type: 'integer' },
      },
      additionalProperties: false,
    },
    images: {
      type: 'object',
      properties: {
        maxJpegQuality: { type: 'integer' },
      },
      additionalProperties: false,
    },
    thresholds: {
      type: 'object',
      properties: {
        minSavedBytes: { type: 'number' },
        minSavedPercent: { type: 'number' },
      },
      additionalProperties: false,
    },
    tools: {
      type: 'object',
      properties: {
        jpegoptim: { type: 'string' },
        optipng: { type: 'string' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

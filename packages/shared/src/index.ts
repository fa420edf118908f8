// @carelink/shared: constants, validation schemas, DB schemas and pure utilities

export * from './constants/index.js';
export * from './schemas/db/index.js';

export * from './schemas/iam.schema.js';
export * from './schemas/link.schema.js';
export * from './schemas/records.schema.js';
export * from './schemas/care.schema.js';

export * from './utils/access.utils.js';
export * from './utils/code.utils.js';
export * from './utils/pregnancy.utils.js';

export {
  parseStatSheet,
  statSheetSchema,
  validateStatSheet,
  type StatSheet,
  type StatSheetInput,
  type StatSheetValidationResult,
} from './sheet.js';

export { StatSheetSchemaError } from './errors.js';

export * from './base/names.js';
export * from './base/numbers.js';
export * from './modules/values.js';
export * from './modules/stats.js';
export * from './modules/relations.js';

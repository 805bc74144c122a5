/**
 * Output module exports
 */

export {
  formatType,
  formatModel,
  formatReport,
  formatJSON,
  DEFAULT_FORMAT_OPTIONS,
} from './formatter.js';

export type { FormatOptions, FlowReport } from './formatter.js';

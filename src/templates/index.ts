export { TemplateCache } from './cache';
export { TemplateStore, TEMPLATE_ID_PATTERN, isValidTemplateId } from './store';
export { mergeTemplate, validateMergeData } from './merge';
export { createMergeHelpers, yesno, joinNonEmpty, formatCurrency, pluralize, loadJson, type MergeHelpers } from './helpers';

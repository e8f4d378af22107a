export { SofficeEngine, abortError, type ConversionEngine, type SofficeEngineOptions } from './soffice';
export { runProcess, type ProcessRunner, type ProcessOutcome, type ProcessOptions } from './process';
export {
  FORMATS,
  TARGET_FORMATS,
  DOCX_CONTENT_TYPE,
  isTargetFormat,
  isDocx,
  normalizeContentType,
  extensionForContentType,
  contentTypeForExtension,
  INPUT_EXTENSIONS,
  verifyOutput,
} from './formats';
export { createArtifact } from './artifact';

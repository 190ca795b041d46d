export {
  extractSourceUnits,
  listSupportedFiles,
  detectDocumentFormat,
  getFileExtension,
  titleFromPath,
  parsePdfUnits,
  parseDocxUnits,
  parseTextUnits,
  SUPPORTED_EXTENSIONS,
  type DocumentFormat,
  type SourceFile,
  type SourceUnit,
  type SupportedExtension,
} from './file-parser';

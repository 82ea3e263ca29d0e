export {
  parseFile,
  validateFile,
  resolveFormat,
  stripHtml,
  isSupportedFileType,
  getFileExtension,
  getMimeType,
  SUPPORTED_EXTENSIONS,
  MAX_FILE_SIZE,
  type DocumentFormat,
  type ParseResult,
  type SupportedExtension,
  type SupportedMimeType,
} from './file-parser';

export {
  FileTextExtractor,
  isSupportedFileType,
  getFileExtension,
  SUPPORTED_EXTENSIONS,
  MAX_FILE_SIZE,
  type TextExtractor,
  type SupportedExtension,
} from './file-parser';

export {
  loadText,
  createDocument,
  inspectDocument,
  computePageOffsets,
  pageAt,
  SUPPORTED_EXTENSIONS,
  type LoadedDocument,
} from './loader.js';

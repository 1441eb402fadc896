export {
  parseGuidelineDocument,
  listDocumentIds,
  loadDocument,
  loadDocuments,
  DocumentLoadError,
  DOCUMENT_EXTENSIONS,
} from './document-loader.js';

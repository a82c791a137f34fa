export { deriveFilename, filenameCandidates, parseAuthorList, sanitizeFilename } from './filename-deriver';

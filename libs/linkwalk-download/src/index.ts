export { httpDownload, httpSync, TEMPORARY_EXTENSION } from './download';
export type { HttpDownloadOptions } from './download';
export { localFileForUri } from './localFile';

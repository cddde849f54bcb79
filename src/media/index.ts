/**
 * Media module exports
 */
export {
    downloadFile,
    mockContent,
    type DownloadOptions,
} from './downloader.js';

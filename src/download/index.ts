export { DownloadManager } from "./downloader";
export type { DownloadManagerOptions } from "./downloader";

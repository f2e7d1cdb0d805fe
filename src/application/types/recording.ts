import { Readable } from 'stream';
import { Result, ApiError } from './common';

/**
 * Parameters for the recordings list
 * Zoom only returns recordings from roughly the last month
 */
export interface RecordingListParams {
  userId?: string;        // Defaults to 'me'
  from?: string;          // Start date (YYYY-MM-DD)
  to?: string;            // End date (YYYY-MM-DD)
  pageSize?: number;      // Page size (max 300)
  nextPageToken?: string;
}

/**
 * Recording list response
 */
export interface RecordingListResponse {
  from: string;
  to: string;
  pageSize: number;
  totalRecords: number;
  nextPageToken?: string;
  recordings: Recording[];
}

/**
 * A single file of a cloud recording (video, audio, transcript, chat...)
 */
export interface RecordingFile {
  id: string;
  meetingId: string;
  recordingStart: string;
  recordingEnd: string;
  fileType: string;
  fileExtension: string;
  fileSize: number;
  playUrl?: string;       // Not present for transcripts and chat files
  downloadUrl: string;
  status: string;         // 'completed' | 'processing'
  recordingType?: string;
}

/**
 * Cloud recording of one meeting
 */
export interface Recording {
  uuid: string;
  id: number;
  accountId: string;
  hostId: string;
  topic: string;
  type: number;
  startTime: string;
  timezone: string;
  duration: number;
  totalSize: number;
  recordingCount: number;
  shareUrl: string;
  recordingFiles: RecordingFile[];
}

/**
 * Response body of a download request
 */
export interface DownloadStream {
  data: Readable;
  mimeType: string;
  contentLength?: number;
}

/**
 * Download result
 */
export interface DownloadResult {
  filePath: string;
  fileSize: number;
  mimeType: string;
}

/**
 * Something that can be downloaded: a recording file or a bare download URL
 */
export type DownloadTarget = RecordingFile | string;

/**
 * Recording service interface
 */
export interface IRecordingService {
  listRecordings(params?: RecordingListParams): Promise<Result<RecordingListResponse, ApiError>>;
  getAllRecordings(params?: RecordingListParams): AsyncGenerator<Recording, void, unknown>;
  findRecordingFile(fileId: string, params?: RecordingListParams): Promise<Result<RecordingFile, ApiError>>;
  openDownloadStream(target: DownloadTarget): Promise<Result<DownloadStream, ApiError>>;
  downloadRecording(target: DownloadTarget, outputPath: string): Promise<Result<DownloadResult, ApiError>>;
  downloadMeetingRecordings(recording: Recording, outputDir: string): Promise<Result<DownloadResult[], ApiError>>;
}

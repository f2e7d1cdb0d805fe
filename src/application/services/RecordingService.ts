import * as path from 'path';
import {
  Result,
  ApiError,
  RecordingListParams,
  RecordingListResponse,
  Recording,
  RecordingFile,
  DownloadResult,
  DownloadStream,
  DownloadTarget,
  IOAuthService,
  IRecordingService,
  ValidationDetail,
  ok,
  err,
} from '../types/index';
import { HttpClient, IHttpClient, httpClient } from '../../infrastructure/http/HttpClient';
import { FileStorage, IFileStorage, fileStorage } from '../../infrastructure/storage/FileStorage';
import { OAuthService, oauthService } from './OAuthService';
import { logger } from '../../infrastructure/logging/Logger';

/**
 * Zoom API response for the recordings list
 */
interface ZoomRecordingListResponse {
  from?: string;
  to?: string;
  page_count?: number;
  page_size?: number;
  total_records?: number;
  next_page_token?: string;
  meetings?: ZoomMeeting[];
}

/**
 * Zoom API meeting entry
 */
interface ZoomMeeting {
  uuid: string;
  id: number;
  account_id: string;
  host_id: string;
  topic: string;
  type: number;
  start_time: string;
  timezone: string;
  duration: number;
  total_size: number;
  recording_count: number;
  share_url: string;
  recording_files?: ZoomRecordingFile[];
}

/**
 * Zoom API recording file entry
 */
interface ZoomRecordingFile {
  id: string;
  meeting_id: string;
  recording_start: string;
  recording_end: string;
  file_type: string;
  file_extension: string;
  file_size: number;
  play_url?: string;        // Absent for TRANSCRIPT/CHAT files
  download_url: string;
  status: string;
  recording_type?: string;
}

/**
 * Zoom caps page_size at 300
 */
const MAX_PAGE_SIZE = 300;

/**
 * Zoom keeps listing cloud recordings for about a month
 */
const DEFAULT_RANGE_DAYS = 30;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

function isValidDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && formatDate(parsed) === value;
}

/**
 * Default list range: the last 30 days up to today (UTC)
 */
function defaultRange(): { from: string; to: string } {
  const today = new Date();
  const from = new Date(today);
  from.setUTCDate(today.getUTCDate() - DEFAULT_RANGE_DAYS);

  return { from: formatDate(from), to: formatDate(today) };
}

/**
 * Append the file's extension unless the path already ends with it
 */
function withExtension(outputPath: string, extension: string): string {
  const ext = extension.toLowerCase();
  if (!ext || outputPath.toLowerCase().endsWith(`.${ext}`)) {
    return outputPath;
  }
  return `${outputPath}.${ext}`;
}

/**
 * Meeting UUIDs may contain '/', '+' and '='
 */
function sanitizeFileName(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Recording service implementation
 */
export class RecordingService implements IRecordingService {
  private readonly httpClient: IHttpClient;
  private readonly fileStorage: IFileStorage;
  private readonly oauthService: IOAuthService;

  constructor(
    httpClient?: IHttpClient,
    fileStorage?: IFileStorage,
    oauthService?: IOAuthService
  ) {
    this.httpClient = httpClient || new HttpClient();
    this.fileStorage = fileStorage || new FileStorage();
    this.oauthService = oauthService || new OAuthService();
  }

  /**
   * List cloud recordings of a user (default: the authenticated user)
   */
  async listRecordings(params: RecordingListParams = {}): Promise<Result<RecordingListResponse, ApiError>> {
    const range = defaultRange();
    const from = params.from ?? range.from;
    const to = params.to ?? range.to;
    const pageSize = params.pageSize ?? MAX_PAGE_SIZE;
    const userId = params.userId ?? 'me';

    const invalid = this.validateListParams(from, to, pageSize);
    if (invalid) {
      return err(invalid);
    }

    logger.info('Fetching recordings', { userId, from, to, pageSize });

    const queryParams = new URLSearchParams({
      from,
      to,
      page_size: pageSize.toString(),
    });
    if (params.nextPageToken) queryParams.append('next_page_token', params.nextPageToken);

    const url = `/users/${encodeURIComponent(userId)}/recordings?${queryParams.toString()}`;

    const result = await this.withAuthorization(() =>
      this.httpClient.get<ZoomRecordingListResponse>(url)
    );

    if (!result.success) {
      if (result.error.type === 'NOT_FOUND') {
        return err({ ...result.error, resourceType: 'User', resourceId: userId });
      }
      return result;
    }

    const meetings = result.data.meetings || [];

    // next_page_token comes back as '' on the last page
    const response: RecordingListResponse = {
      from: result.data.from ?? from,
      to: result.data.to ?? to,
      pageSize: result.data.page_size ?? pageSize,
      totalRecords: result.data.total_records ?? meetings.length,
      nextPageToken: result.data.next_page_token || undefined,
      recordings: meetings.map(meeting => this.mapRecording(meeting)),
    };

    logger.info('Recordings fetched successfully', {
      count: response.recordings.length,
      totalRecords: response.totalRecords,
      hasNextPage: !!response.nextPageToken,
    });

    return ok(response);
  }

  /**
   * Get all recordings with pagination (AsyncGenerator)
   */
  async *getAllRecordings(params: RecordingListParams = {}): AsyncGenerator<Recording, void, unknown> {
    logger.info('Starting paginated recordings fetch', { from: params.from, to: params.to });

    let nextPageToken: string | undefined = params.nextPageToken;
    let pageCount = 0;

    do {
      const result = await this.listRecordings({
        ...params,
        nextPageToken,
      });

      if (!result.success) {
        logger.error('Failed to fetch recordings page', undefined, {
          pageCount,
          errorType: result.error.type,
        });
        throw new Error(`Failed to fetch recordings: ${result.error.message}`);
      }

      pageCount++;

      for (const recording of result.data.recordings) {
        yield recording;
      }

      nextPageToken = result.data.nextPageToken;
    } while (nextPageToken);

    logger.info('Completed paginated recordings fetch', { pageCount });
  }

  /**
   * Find a recording file by its id across all pages of the range
   */
  async findRecordingFile(
    fileId: string,
    params: RecordingListParams = {}
  ): Promise<Result<RecordingFile, ApiError>> {
    let nextPageToken: string | undefined = params.nextPageToken;

    do {
      const result = await this.listRecordings({ ...params, nextPageToken });
      if (!result.success) {
        return result;
      }

      for (const recording of result.data.recordings) {
        const file = recording.recordingFiles.find(candidate => candidate.id === fileId);
        if (file) {
          return ok(file);
        }
      }

      nextPageToken = result.data.nextPageToken;
    } while (nextPageToken);

    return err({
      type: 'NOT_FOUND',
      message: `Recording file ${fileId} not found in the requested range`,
      resourceType: 'RecordingFile',
      resourceId: fileId,
    });
  }

  /**
   * Open the response body of a recording download as a stream
   */
  async openDownloadStream(target: DownloadTarget): Promise<Result<DownloadStream, ApiError>> {
    const downloadUrl = typeof target === 'string' ? target : target.downloadUrl;
    const resourceId = typeof target === 'string' ? target : target.id;

    if (!this.isDownloadUrl(downloadUrl)) {
      return err({
        type: 'VALIDATION_ERROR',
        message: `Invalid download URL: ${downloadUrl}`,
        details: [{ field: 'downloadUrl', message: 'must be an absolute http(s) URL' }],
      });
    }

    const result = await this.withAuthorization(() => this.httpClient.download(downloadUrl));

    if (!result.success && result.error.type === 'NOT_FOUND') {
      return err({
        ...result.error,
        message: `Recording not found: ${result.error.message}`,
        resourceType: 'RecordingFile',
        resourceId,
      });
    }

    return result;
  }

  /**
   * Download a recording file to outputPath
   */
  async downloadRecording(
    target: DownloadTarget,
    outputPath: string
  ): Promise<Result<DownloadResult, ApiError>> {
    const fileName = typeof target === 'string'
      ? outputPath
      : withExtension(outputPath, target.fileExtension);

    logger.info('Downloading recording', {
      downloadUrl: typeof target === 'string' ? target : target.downloadUrl,
      outputPath: fileName,
    });

    const streamResult = await this.openDownloadStream(target);
    if (!streamResult.success) {
      return streamResult;
    }

    try {
      const saved = await this.fileStorage.save(fileName, streamResult.data.data);

      const result: DownloadResult = {
        filePath: saved.filePath,
        fileSize: saved.bytesWritten,
        mimeType: streamResult.data.mimeType,
      };

      logger.info('Recording downloaded successfully', {
        filePath: result.filePath,
        fileSize: result.fileSize,
        mimeType: result.mimeType,
      });

      return ok(result);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      return err({
        type: 'STORAGE_ERROR',
        message: `Failed to save recording: ${cause?.message ?? 'unknown error'}`,
        path: fileName,
        cause,
      });
    }
  }

  /**
   * Download every file of a meeting into outputDir, one after another.
   * Stops at the first failure.
   */
  async downloadMeetingRecordings(
    recording: Recording,
    outputDir: string
  ): Promise<Result<DownloadResult[], ApiError>> {
    logger.info('Downloading meeting recordings', {
      meetingId: recording.uuid,
      topic: recording.topic,
      fileCount: recording.recordingFiles.length,
    });

    const results: DownloadResult[] = [];

    for (const file of recording.recordingFiles) {
      const baseName = `${sanitizeFileName(file.meetingId)}_${sanitizeFileName(file.recordingType ?? file.fileType.toLowerCase())}`;
      const result = await this.downloadRecording(file, path.join(outputDir, baseName));

      if (!result.success) {
        logger.error('Meeting download stopped', undefined, {
          fileId: file.id,
          downloaded: results.length,
          errorType: result.error.type,
        });
        return result;
      }

      results.push(result.data);
    }

    return ok(results);
  }

  /**
   * Run a request with a valid token. When Zoom rejects a token that looked
   * valid, refresh once and repeat the request once.
   */
  private async withAuthorization<T>(
    request: () => Promise<Result<T, ApiError>>
  ): Promise<Result<T, ApiError>> {
    const tokenResult = await this.oauthService.getAccessToken();
    if (!tokenResult.success) {
      return err({
        type: 'AUTH_ERROR',
        message: tokenResult.error.message,
      });
    }

    this.httpClient.setAuthToken(tokenResult.data);

    const result = await request();
    if (result.success || result.error.type !== 'AUTH_ERROR') {
      return result;
    }

    logger.warn('Access token rejected, refreshing', { reason: result.error.message });

    const refreshResult = await this.oauthService.refreshToken();
    if (!refreshResult.success) {
      return result;
    }

    this.httpClient.setAuthToken(refreshResult.data.accessToken);
    return request();
  }

  private validateListParams(from: string, to: string, pageSize: number): ApiError | null {
    const details: ValidationDetail[] = [];

    if (!isValidDate(from)) {
      details.push({ field: 'from', message: 'must be a date in YYYY-MM-DD format' });
    }
    if (!isValidDate(to)) {
      details.push({ field: 'to', message: 'must be a date in YYYY-MM-DD format' });
    }
    if (details.length === 0 && from > to) {
      details.push({ field: 'from', message: 'must not be after to' });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      details.push({ field: 'pageSize', message: `must be between 1 and ${MAX_PAGE_SIZE}` });
    }

    if (details.length === 0) {
      return null;
    }

    return {
      type: 'VALIDATION_ERROR',
      message: `Invalid recording list parameters: ${details.map(detail => detail.field).join(', ')}`,
      details,
    };
  }

  private isDownloadUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === 'https:' || url.protocol === 'http:';
    } catch {
      return false;
    }
  }

  /**
   * Map Zoom meeting recording to internal format
   */
  private mapRecording(zoom: ZoomMeeting): Recording {
    return {
      uuid: zoom.uuid,
      id: zoom.id,
      accountId: zoom.account_id,
      hostId: zoom.host_id,
      topic: zoom.topic,
      type: zoom.type,
      startTime: zoom.start_time,
      timezone: zoom.timezone,
      duration: zoom.duration,
      totalSize: zoom.total_size,
      recordingCount: zoom.recording_count,
      shareUrl: zoom.share_url,
      recordingFiles: (zoom.recording_files || []).map(file => ({
        id: file.id,
        meetingId: file.meeting_id,
        recordingStart: file.recording_start,
        recordingEnd: file.recording_end,
        fileType: file.file_type,
        fileExtension: file.file_extension,
        fileSize: file.file_size,
        playUrl: file.play_url,
        downloadUrl: file.download_url,
        status: file.status,
        recordingType: file.recording_type,
      })),
    };
  }
}

/**
 * Default recording service instance
 */
export const recordingService = new RecordingService(httpClient, fileStorage, oauthService);

export default recordingService;

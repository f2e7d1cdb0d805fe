#!/usr/bin/env node
import crypto from 'crypto';
import { OAuthService } from '../../application/services/OAuthService';
import { RecordingService } from '../../application/services/RecordingService';
import { Recording, RecordingListParams } from '../../application/types/index';
import { OAuthCallbackServer } from '../../infrastructure/server/OAuthCallbackServer';
import { FileTokenStore } from '../../infrastructure/storage/TokenStore';
import { config } from '../../config/index';

/**
 * CLI Commands
 */
const COMMANDS = {
  AUTH: 'auth',
  AUTH_CALLBACK: 'auth-callback',
  TOKEN: 'token',
  RECORDINGS: 'recordings',
  DOWNLOAD: 'download',
  DOWNLOAD_MEETING: 'download-meeting',
  LOGOUT: 'logout',
  HELP: 'help',
} as const;

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Zoom Cloud Recordings - CLI

Usage: npm run cli -- <command> [options]

Commands:
  auth                              Obtain a token (opens the OAuth flow for user apps)
  auth-callback <code|url>          Exchange a code, or the URL you were redirected to
  token                             Show the state of the stored token
  recordings [--from D] [--to D]    List cloud recordings (dates as YYYY-MM-DD)
  download <fileId|url> [path]      Download one recording file
  download-meeting <uuid|id> [dir]  Download every file of a meeting
  logout                            Delete the stored token
  help                              Show this help message

Examples:
  npm run cli -- auth
  npm run cli -- recordings --from 2024-01-01 --to 2024-01-31
  npm run cli -- download 1a2b3c4d-file-id ./downloads/standup
  npm run cli -- download-meeting 85746065432 ./downloads
`);
}

/**
 * Pick --from/--to out of the arguments
 */
function parseRangeArgs(args: string[]): RecordingListParams {
  const params: RecordingListParams = {};

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--from' && value) {
      params.from = value;
      i++;
    } else if (args[i] === '--to' && value) {
      params.to = value;
      i++;
    }
  }

  return params;
}

/**
 * Check if input is a URL
 */
function isUrl(input: string): boolean {
  return input.startsWith('http://') || input.startsWith('https://');
}

function createOAuthService(): OAuthService {
  return new OAuthService({ tokenStore: new FileTokenStore() });
}

/**
 * Load the stored token and make sure it is usable (refreshing it if needed)
 */
async function requireAuthenticated(oauthService: OAuthService): Promise<void> {
  await oauthService.loadToken();

  const tokenResult = await oauthService.getAccessToken();
  if (!tokenResult.success) {
    console.error('Not authenticated or token refresh failed:', tokenResult.error.message);
    console.error('Run "npm run cli -- auth" first.');
    process.exit(1);
  }
}

/**
 * Handle auth command
 */
async function handleAuth(): Promise<void> {
  const oauthService = createOAuthService();

  await oauthService.loadToken();
  if (oauthService.isAuthenticated()) {
    console.log('Already authenticated!');
    console.log('To re-authenticate, run "npm run cli -- logout" first.\n');
    return;
  }

  if (oauthService.grantType === 'account_credentials') {
    console.log('Requesting server-to-server token...\n');

    const result = await oauthService.getToken();
    if (!result.success) {
      console.error('✗ Authentication failed:', result.error.message);
      process.exit(1);
    }

    console.log('✓ Authentication successful!');
    console.log(`Token expires at: ${result.data.expiresAt.toISOString()}\n`);
    return;
  }

  console.log('Starting OAuth authentication flow...\n');

  const state = crypto.randomBytes(16).toString('hex');
  const callbackServer = new OAuthCallbackServer(oauthService, { expectedState: state });
  const authUrl = oauthService.getAuthorizationUrl(state);

  console.log('Please visit the following URL to authorize:');
  console.log('\n' + authUrl + '\n');
  console.log('Waiting for authorization callback on ' + config.zoom.redirectUri + '...\n');
  console.log('(Press Ctrl+C to cancel)\n');

  try {
    const result = await callbackServer.waitForCallback();

    if (!result.success) {
      console.error('\n✗ Authentication failed:', result.error);
      console.log('\nAlternatively, paste the URL you were redirected to:');
      console.log('  npm run cli -- auth-callback "<url>"\n');
      process.exitCode = 1;
      return;
    }

    console.log('\n✓ Authentication successful!');
    console.log('Token saved. You can now use other commands.\n');
  } finally {
    callbackServer.stop();
  }
}

/**
 * Handle auth callback (exchange code for token)
 */
async function handleAuthCallback(input: string): Promise<void> {
  const oauthService = createOAuthService();

  const code = oauthService.parseAuthorizationCode(input);
  if (!code) {
    console.error('Error: no authorization code found in the input.');
    process.exit(1);
  }

  console.log('Exchanging authorization code for token...\n');

  const result = await oauthService.getToken(code);
  if (!result.success) {
    console.error('Authentication failed:', result.error.message);
    process.exit(1);
  }

  console.log('Authentication successful!');
  console.log(`Token expires at: ${result.data.expiresAt.toISOString()}\n`);
}

/**
 * Handle token command
 */
async function handleToken(): Promise<void> {
  const oauthService = createOAuthService();
  await oauthService.loadToken();

  const expiresAt = oauthService.getExpiresAt();

  console.log(`Grant type: ${oauthService.grantType}`);
  console.log(`State: ${oauthService.getTokenState()}`);
  console.log(`Expires at: ${expiresAt ? expiresAt.toISOString() : 'N/A'}`);
}

/**
 * Print one meeting with its files
 */
function printRecording(recording: Recording): void {
  console.log(`Meeting: ${recording.topic}`);
  console.log(`  ID: ${recording.id}  UUID: ${recording.uuid}`);
  console.log(`  Start: ${recording.startTime} (${recording.timezone})`);
  console.log(`  Duration: ${recording.duration} min`);
  console.log(`  Total Size: ${(recording.totalSize / 1024 / 1024).toFixed(2)} MB`);

  for (const file of recording.recordingFiles) {
    console.log(`  - File ${file.id}`);
    console.log(`      Type: ${file.fileType}${file.recordingType ? ` (${file.recordingType})` : ''}`);
    console.log(`      Size: ${(file.fileSize / 1024).toFixed(2)} KB`);
    console.log(`      Status: ${file.status}`);
  }
  console.log('─'.repeat(100));
}

/**
 * Handle recordings command
 */
async function handleRecordings(args: string[]): Promise<void> {
  const oauthService = createOAuthService();
  await requireAuthenticated(oauthService);

  const recordingService = new RecordingService(undefined, undefined, oauthService);
  const result = await recordingService.listRecordings(parseRangeArgs(args));

  if (!result.success) {
    console.error('Failed to fetch recordings:', result.error.message);
    process.exit(1);
  }

  console.log(`Range: ${result.data.from} - ${result.data.to}`);
  console.log(`Total records: ${result.data.totalRecords}`);
  console.log(`Fetched: ${result.data.recordings.length} meetings\n`);

  if (result.data.recordings.length === 0) {
    console.log('No recordings found. Zoom only lists recordings from about the last month.');
    return;
  }

  console.log('─'.repeat(100));
  for (const recording of result.data.recordings) {
    printRecording(recording);
  }

  if (result.data.nextPageToken) {
    console.log('\nMore records available. Narrow the date range to see them.');
  }
}

/**
 * Handle download command
 * Supports both download URL and recording file ID
 */
async function handleDownload(input: string, outputPath?: string): Promise<void> {
  const oauthService = createOAuthService();
  await requireAuthenticated(oauthService);

  const recordingService = new RecordingService(undefined, undefined, oauthService);
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const target = outputPath || `recording_${timestamp}`;

  if (isUrl(input)) {
    const result = await recordingService.downloadRecording(input, target);
    if (!result.success) {
      console.error('Failed to download recording:', result.error.message);
      process.exit(1);
    }
    console.log(`Downloaded ${result.data.filePath} (${(result.data.fileSize / 1024).toFixed(2)} KB)`);
    return;
  }

  console.log(`Searching recording file "${input}"...\n`);
  const fileResult = await recordingService.findRecordingFile(input);
  if (!fileResult.success) {
    console.error('Recording not found:', fileResult.error.message);
    console.log('\nTip: Use "npm run cli -- recordings" to list available recordings.\n');
    process.exit(1);
  }

  const result = await recordingService.downloadRecording(fileResult.data, target);
  if (!result.success) {
    console.error('Failed to download recording:', result.error.message);
    process.exit(1);
  }

  console.log('Download successful!');
  console.log(`  File: ${result.data.filePath}`);
  console.log(`  Size: ${(result.data.fileSize / 1024).toFixed(2)} KB`);
  console.log(`  Type: ${result.data.mimeType}\n`);
}

/**
 * Handle download-meeting command
 */
async function handleDownloadMeeting(meetingKey: string, outputDir: string): Promise<void> {
  const oauthService = createOAuthService();
  await requireAuthenticated(oauthService);

  const recordingService = new RecordingService(undefined, undefined, oauthService);

  let meeting: Recording | undefined;
  for await (const recording of recordingService.getAllRecordings()) {
    if (recording.uuid === meetingKey || String(recording.id) === meetingKey) {
      meeting = recording;
      break;
    }
  }

  if (!meeting) {
    console.error(`Meeting ${meetingKey} has no cloud recordings in the last month.`);
    process.exit(1);
  }

  const result = await recordingService.downloadMeetingRecordings(meeting, outputDir);
  if (!result.success) {
    console.error('Failed to download meeting recordings:', result.error.message);
    process.exit(1);
  }

  console.log(`Downloaded ${result.data.length} files:`);
  for (const file of result.data) {
    console.log(`  ${file.filePath} (${(file.fileSize / 1024).toFixed(2)} KB)`);
  }
}

/**
 * Handle logout command
 */
async function handleLogout(): Promise<void> {
  await createOAuthService().logout();
  console.log('Stored token deleted.');
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0]?.toLowerCase();

  if (!command || command === COMMANDS.HELP) {
    printHelp();
    return;
  }

  switch (command) {
    case COMMANDS.AUTH:
      await handleAuth();
      break;

    case COMMANDS.AUTH_CALLBACK: {
      const input = args[1];
      if (!input) {
        console.error('Error: Authorization code or redirect URL is required.');
        console.log('Usage: npm run cli -- auth-callback <code|url>');
        process.exit(1);
      }
      await handleAuthCallback(input);
      break;
    }

    case COMMANDS.TOKEN:
      await handleToken();
      break;

    case COMMANDS.RECORDINGS:
      await handleRecordings(args.slice(1));
      break;

    case COMMANDS.DOWNLOAD: {
      const downloadInput = args[1];
      if (!downloadInput) {
        console.error('Error: Recording file ID or download URL is required.');
        console.log('Usage: npm run cli -- download <fileId|url> [path]');
        process.exit(1);
      }
      await handleDownload(downloadInput, args[2]);
      break;
    }

    case COMMANDS.DOWNLOAD_MEETING: {
      const meetingKey = args[1];
      if (!meetingKey) {
        console.error('Error: Meeting UUID or ID is required.');
        console.log('Usage: npm run cli -- download-meeting <uuid|id> [dir]');
        process.exit(1);
      }
      await handleDownloadMeeting(meetingKey, args[2] || '.');
      break;
    }

    case COMMANDS.LOGOUT:
      await handleLogout();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

// Run main
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

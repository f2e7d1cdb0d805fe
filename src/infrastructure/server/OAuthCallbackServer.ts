import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { IOAuthService } from '../../application/types/index';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * Authentication timeout (5 minutes)
 */
const AUTH_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Result type for OAuth callback
 */
export interface OAuthCallbackResult {
  success: boolean;
  error?: string;
}

/**
 * Query parameters Zoom appends to the redirect URI
 */
export interface OAuthCallbackQuery {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

/**
 * Browser page plus the outcome for the waiting CLI
 */
export interface OAuthCallbackResponse {
  html: string;
  result: OAuthCallbackResult;
}

export interface OAuthCallbackServerOptions {
  redirectUri?: string;
  expectedState?: string;
  timeoutMs?: number;
}

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Local HTTP server receiving the authorization_code redirect.
 * Listens on the port and path of the configured redirect URI.
 */
export class OAuthCallbackServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly callbackPath: string;
  private readonly expectedState?: string;
  private readonly timeoutMs: number;
  private server: Server | null = null;
  private resolvePromise: ((result: OAuthCallbackResult) => void) | null = null;
  private timeoutId: NodeJS.Timeout | null = null;

  constructor(private readonly oauthService: IOAuthService, options: OAuthCallbackServerOptions = {}) {
    const redirectUrl = new URL(options.redirectUri || config.zoom.redirectUri);

    this.port = redirectUrl.port
      ? parseInt(redirectUrl.port, 10)
      : redirectUrl.protocol === 'https:' ? 443 : 80;
    this.callbackPath = redirectUrl.pathname;
    this.expectedState = options.expectedState;
    this.timeoutMs = options.timeoutMs ?? AUTH_TIMEOUT_MS;

    this.app = express();
    this.setupRoutes();
  }

  /**
   * Setup routes for OAuth callback
   */
  private setupRoutes(): void {
    this.app.get(this.callbackPath, async (req: Request, res: Response) => {
      let response: OAuthCallbackResponse;
      try {
        response = await this.handleCallback({
          code: queryValue(req.query.code),
          state: queryValue(req.query.state),
          error: queryValue(req.query.error),
          error_description: queryValue(req.query.error_description),
        });
      } catch (error) {
        logger.error('OAuth callback failed', error instanceof Error ? error : undefined);
        response = this.failure('Unexpected error while storing the token');
      }

      res.status(response.result.success ? 200 : 400).send(response.html);
      this.resolvePromise?.(response.result);
    });
  }

  /**
   * Turn the redirect query into a token (or an error page)
   */
  async handleCallback(query: OAuthCallbackQuery): Promise<OAuthCallbackResponse> {
    if (query.error) {
      const errorMessage = query.error_description
        ? `${query.error}: ${query.error_description}`
        : query.error;

      logger.error('OAuth error received', undefined, { error: query.error, errorDescription: query.error_description });

      return this.failure(errorMessage);
    }

    if (this.expectedState !== undefined && query.state !== this.expectedState) {
      logger.error('OAuth state mismatch');
      return this.failure('State parameter does not match the authorization request');
    }

    if (!query.code) {
      logger.error('No authorization code received');
      return this.failure('No authorization code received');
    }

    logger.info('Received authorization code, exchanging for token');

    const result = await this.oauthService.exchangeCodeForToken(query.code);

    if (!result.success) {
      logger.error('Token exchange failed', undefined, { errorType: result.error.type });
      return this.failure(`Failed to exchange authorization code: ${result.error.message}`);
    }

    logger.info('Token exchange successful');

    return {
      html: this.generateHtmlPage(
        'Authentication Successful',
        `<p class="success">Authentication completed successfully!</p>
         <p>You can close this window and return to the terminal.</p>`
      ),
      result: { success: true },
    };
  }

  private failure(message: string): OAuthCallbackResponse {
    return {
      html: this.generateHtmlPage(
        'Authentication Error',
        `<p class="error">${this.escapeHtml(message)}</p>
         <p>Please close this window and try again.</p>`
      ),
      result: { success: false, error: message },
    };
  }

  /**
   * Generate HTML page for browser response
   */
  private generateHtmlPage(title: string, content: string): string {
    return `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${this.escapeHtml(title)}</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background-color: #f5f5f5;
    }
    .container {
      text-align: center;
      padding: 40px;
      background: white;
      border-radius: 8px;
      box-shadow: 0 2px 10px rgba(0,0,0,0.1);
      max-width: 500px;
    }
    h1 {
      color: #333;
      margin-bottom: 20px;
    }
    p {
      color: #666;
      line-height: 1.6;
    }
    .success {
      color: #28a745;
      font-weight: bold;
    }
    .error {
      color: #dc3545;
      font-weight: bold;
    }
  </style>
</head>
<body>
  <div class="container">
    <h1>${this.escapeHtml(title)}</h1>
    ${content}
  </div>
</body>
</html>`;
  }

  /**
   * Escape HTML special characters
   */
  private escapeHtml(text: string): string {
    const map: Record<string, string> = {
      '&': '&amp;',
      '<': '&lt;',
      '>': '&gt;',
      '"': '&quot;',
      "'": '&#039;',
    };
    return text.replace(/[&<>"']/g, (char) => map[char] || char);
  }

  /**
   * Start the callback server and wait for OAuth callback
   */
  async waitForCallback(): Promise<OAuthCallbackResult> {
    return new Promise((resolve) => {
      this.resolvePromise = resolve;

      this.server = this.app.listen(this.port, () => {
        logger.info('OAuth callback server started', { port: this.port, path: this.callbackPath });
      });

      this.server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`Port ${this.port} is already in use`);
          resolve({
            success: false,
            error: `Port ${this.port} is already in use. Please stop any other service using this port.`,
          });
        } else {
          logger.error('Server error', error);
          resolve({ success: false, error: error.message });
        }
      });

      // Set timeout
      this.timeoutId = setTimeout(() => {
        logger.warn('OAuth callback timeout');
        this.stop();
        resolve({ success: false, error: 'Authentication timeout. Please try again.' });
      }, this.timeoutMs);
    });
  }

  /**
   * Stop the callback server
   */
  stop(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }

    if (this.server) {
      this.server.close((error) => {
        if (error) {
          logger.error('Error stopping OAuth callback server', error);
        } else {
          logger.info('OAuth callback server stopped');
        }
      });
      this.server = null;
    }
  }
}

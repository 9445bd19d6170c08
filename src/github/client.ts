/**
 * Minimal authenticated client for the GitHub REST API
 */
import { ProvisioningError, ErrorStage, describeError } from '../errors';
import { GitHubClientOptions, GitHubResponse } from './types';

export const GITHUB_API_BASE = 'https://api.github.com';

export class GitHubClient {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly timeoutMs?: number;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? GITHUB_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Path of a repository's Actions secrets endpoint, with each segment encoded
   */
  static secretsPath(owner: string, repo: string, ...rest: string[]): string {
    return ['repos', owner, repo, 'actions', 'secrets', ...rest]
      .map(segment => encodeURIComponent(segment))
      .reduce((path, segment) => `${path}/${segment}`, '');
  }

  /**
   * Make an authenticated request. Transport failures (DNS, reset, timeout)
   * are reported as RequestFailed; HTTP error statuses are returned to the
   * caller, which owns their meaning.
   */
  async request(method: 'GET' | 'PUT', path: string, body: unknown, stage: ErrorStage): Promise<GitHubResponse> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined
      });

      return {
        status: response.status,
        ok: response.ok,
        body: await response.text()
      };
    } catch (error) {
      const { message } = describeError(error);
      throw new ProvisioningError('RequestFailed', `GitHub request ${method} ${path} failed: ${message}`, {
        stage,
        details: message,
        cause: error
      });
    }
  }
}

/**
 * Parse a JSON response body; an empty body is an empty object.
 * Returns undefined when the body is not a JSON object.
 */
export function parseJsonObject(body: string): Record<string, unknown> | undefined {
  if (body.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return undefined;
  } catch {
    return undefined;
  }
}

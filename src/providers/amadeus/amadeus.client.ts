import axios, { type AxiosInstance } from 'axios';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { ProviderEnvironment } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import { errorBodySchema, tokenResponseSchema } from './amadeus.schemas.js';

const HOSTS: Record<ProviderEnvironment, string> = {
  [ProviderEnvironment.TEST]: 'https://test.api.amadeus.com',
  [ProviderEnvironment.PRODUCTION]: 'https://api.amadeus.com',
};

// Refresh the token this long before the provider says it expires
const TOKEN_REFRESH_MARGIN_MS = 60_000;

export interface AmadeusClientOptions {
  apiKey: string;
  apiSecret: string;
  environment: ProviderEnvironment;
  timeoutMs?: number;
  /** Injected for tests; defaults to a fresh axios instance */
  http?: AxiosInstance;
  now?: () => number;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

export class AmadeusClient {
  readonly environment: ProviderEnvironment;
  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(private readonly options: AmadeusClientOptions) {
    if (!options.apiKey || !options.apiSecret) {
      throw new AppError('Amadeus API key and secret must be provided', 500, ErrorCode.CONFIG_ERROR);
    }
    this.environment = options.environment;
    this.now = options.now ?? Date.now;
    this.http =
      options.http ??
      axios.create({
        baseURL: HOSTS[options.environment],
        timeout: options.timeoutMs ?? 15_000,
      });
    logger.info(`Using Amadeus ${options.environment.toUpperCase()} environment (${HOSTS[options.environment]})`);
  }

  // ── Auth ──

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.value;
    // Concurrent callers share one token request
    this.pendingToken ??= this.fetchToken().finally(() => {
      this.pendingToken = null;
    });
    return this.pendingToken;
  }

  private async fetchToken(): Promise<string> {
    try {
      const response = await this.http.post(
        '/v1/security/oauth2/token',
        new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: this.options.apiKey,
          client_secret: this.options.apiSecret,
        }).toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } },
      );

      const parsed = tokenResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new AppError('Malformed Amadeus token response', 502, ErrorCode.PROVIDER_BAD_RESPONSE);
      }

      this.token = {
        value: parsed.data.access_token,
        expiresAt: this.now() + parsed.data.expires_in * 1000 - TOKEN_REFRESH_MARGIN_MS,
      };
      logger.debug('Amadeus access token obtained');
      return this.token.value;
    } catch (error) {
      throw this.toAppError(error, 'POST /v1/security/oauth2/token');
    }
  }

  // ── Requests ──

  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    const token = await this.accessToken();
    try {
      const response = await this.http.get(path, {
        params: Object.fromEntries(Object.entries(params).filter(([, v]) => v !== undefined)),
        headers: { Authorization: `Bearer ${token}` },
      });
      return response.data;
    } catch (error) {
      const appError = this.toAppError(error, `GET ${path}`);
      // A rejected token is dropped so the next call re-authenticates
      if (appError.code === ErrorCode.PROVIDER_AUTH_FAILED) this.token = null;
      throw appError;
    }
  }

  private toAppError(error: unknown, operation: string): AppError {
    if (error instanceof AppError) return error;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const body = errorBodySchema.safeParse(error.response?.data);
      const first = body.success ? body.data.errors[0] : undefined;
      const message = first
        ? `${first.title ?? 'Amadeus error'}${first.detail ? `: ${first.detail}` : ''}`
        : error.message;

      return AppError.provider(`Amadeus ${operation} failed: ${message}`, status, {
        operation,
        providerCode: first?.code,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return AppError.provider(`Amadeus ${operation} failed: ${message}`, undefined, { operation });
  }
}

import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const INITIAL_BACKOFF_MS = 1000;
/** Longest wait before a retry. A server asking for more gets no retry. */
const MAX_BACKOFF_MS = 30000;

interface RateLimit {
    perSecond: number;
    burst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { perSecond: 5, burst: 5 };

const RATE_LIMITS: Record<string, RateLimit> = {
    inspire: { perSecond: 3, burst: 15 },  // 15 requests per 5s window
    ads: { perSecond: 5, burst: 5 },       // daily quota; keep bursts small
};

/**
 * Token bucket. A request takes its token up front; when the bucket runs
 * dry the balance goes negative and the caller sleeps until it is repaid,
 * so concurrent callers queue behind each other.
 */
class TokenBucket {
    private tokens: number;
    private updatedAt = Date.now();

    constructor(private readonly limit: RateLimit) {
        this.tokens = limit.burst;
    }

    async take(): Promise<void> {
        const now = Date.now();
        const refill = ((now - this.updatedAt) / 1000) * this.limit.perSecond;
        this.tokens = Math.min(this.limit.burst, this.tokens + refill) - 1;
        this.updatedAt = now;

        if (this.tokens < 0) {
            await sleep((-this.tokens / this.limit.perSecond) * 1000);
        }
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    /** Objects are sent as JSON */
    body?: string | object;
    timeout?: number;
    /** Rate-limit bucket: "inspire", "ads", or anything else for the default */
    source?: string;
}

/**
 * `data` is parsed JSON when the server says so, the raw text otherwise;
 * callers narrow it.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    maxRetries?: number;
    version?: string;
}

export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

interface PreparedRequest {
    method: 'GET' | 'POST';
    headers: Record<string, string>;
    body?: string;
}

/**
 * Shared HTTP client for the INSPIRE and ADS adapters: per-service rate
 * limits, timeouts, and bounded retries on 429/5xx and dropped connections.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 3;
        this.userAgent = `citefetch/${options?.version ?? '1.0.0'}`;
    }

    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { timeout = this.defaultTimeout, source = 'default' } = options;
        const prepared = this.prepare(options);
        const bucket = this.bucketFor(source);

        for (let attempt = 0; ; attempt++) {
            await bucket.take();

            let sent: { response: Response; data: unknown };
            try {
                sent = await send(url, prepared, timeout);
            } catch (error) {
                const code = networkErrorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);
                if (!retryable || attempt >= this.maxRetries) {
                    throw networkFailure(error, url, timeout, retryable);
                }

                const delayMs = backoff(attempt);
                getLogger().warn({ url, code, attempt: attempt + 1, delayMs }, 'Network error, retrying');
                await sleep(delayMs);
                continue;
            }

            const { response, data } = sent;
            if (response.ok) {
                return {
                    status: response.status,
                    headers: Object.fromEntries(response.headers.entries()),
                    data,
                    ok: true,
                };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            const delayMs = retryable && attempt < this.maxRetries
                ? retryDelay(response.headers.get('retry-after'), attempt)
                : null;
            if (delayMs === null) {
                throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
            }

            getLogger().warn({ url, status: response.status, attempt: attempt + 1, delayMs }, 'Retryable HTTP error, retrying');
            await sleep(delayMs);
        }
    }

    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    async post(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    private prepare({ method = 'GET', headers = {}, body }: HttpRequestOptions): PreparedRequest {
        const prepared: PreparedRequest = {
            method,
            headers: { 'User-Agent': this.userAgent, ...headers },
        };

        if (typeof body === 'string') {
            prepared.body = body;
        } else if (body !== undefined) {
            prepared.body = JSON.stringify(body);
            prepared.headers['Content-Type'] = prepared.headers['Content-Type'] ?? 'application/json';
        }

        return prepared;
    }

    private bucketFor(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            bucket = new TokenBucket(RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * One fetch with a timeout covering both the response and its body.
 */
async function send(url: string, request: PreparedRequest, timeout: number): Promise<{ response: Response; data: unknown }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);

    try {
        const response = await fetch(url, { ...request, signal: controller.signal });
        const contentType = response.headers.get('content-type') ?? '';
        const data: unknown = contentType.includes('application/json')
            ? await response.json()
            : await response.text();
        return { response, data };
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Wait before retrying a failed status: the server's Retry-After if it
 * sent one, exponential backoff otherwise. Null when Retry-After exceeds
 * MAX_BACKOFF_MS.
 */
function retryDelay(retryAfter: string | null, attempt: number): number | null {
    const requested = parseRetryAfter(retryAfter);
    if (requested === null) return backoff(attempt);
    return requested <= MAX_BACKOFF_MS ? requested : null;
}

/**
 * Retry-After as delta-seconds or an HTTP date, in milliseconds.
 */
function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

    const date = Date.parse(header);
    return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

/**
 * Exponential backoff with up to 50% jitter, capped at MAX_BACKOFF_MS.
 */
function backoff(attempt: number): number {
    const exponential = INITIAL_BACKOFF_MS * 2 ** attempt;
    return Math.min(MAX_BACKOFF_MS, exponential + Math.random() * exponential * 0.5);
}

function networkFailure(error: unknown, url: string, timeout: number, retryable: boolean): HttpError {
    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }
    return new HttpError(`Network error: ${error instanceof Error ? error.message : String(error)}`, 0, retryable);
}

/**
 * System error code of a failed fetch. undici puts it on `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 * Options only take effect on the first call.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}

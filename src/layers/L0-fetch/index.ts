import { ThemeGenError, toError } from '../../shared/types';
import { createLogger } from '../../shared/logger';

const log = createLogger({ module: 'fetch' });

export type HttpClient = typeof globalThis.fetch;

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  httpClient?: HttpClient;
}

async function get(url: string, accept: string, options: FetchOptions): Promise<Response> {
  const fetchFn = options.httpClient ?? globalThis.fetch;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      redirect: 'follow',
      headers: {
        'User-Agent': options.userAgent,
        Accept: accept,
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E202',
      severity: 'high',
      message: `Request to ${url} failed: ${toError(err).message}`,
      context: { url },
      cause: toError(err),
    });
  }

  if (!response.ok) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E201',
      severity: 'high',
      message: `GET ${url} returned HTTP ${response.status}`,
      context: { url },
    });
  }

  return response;
}

/** Download the color documentation page as text. */
export async function fetchPage(url: string, options: FetchOptions): Promise<string> {
  const response = await get(url, 'text/html,application/xhtml+xml,*/*', options);
  let html: string;
  try {
    html = await response.text();
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E202',
      severity: 'high',
      message: `Failed to read body of ${url}: ${toError(err).message}`,
      context: { url },
      cause: toError(err),
    });
  }
  log.info({ url, bytes: html.length }, 'Fetched page');
  return html;
}

/** Download the icon archive into memory. */
export async function fetchArchive(url: string, options: FetchOptions): Promise<Buffer> {
  const response = await get(url, 'application/x-tar,*/*', options);
  let archive: Buffer;
  try {
    archive = Buffer.from(await response.arrayBuffer());
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E202',
      severity: 'high',
      message: `Failed to read body of ${url}: ${toError(err).message}`,
      context: { url },
      cause: toError(err),
    });
  }
  if (archive.length === 0) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E201',
      severity: 'high',
      message: `GET ${url} returned an empty body`,
      context: { url },
    });
  }
  log.info({ url, bytes: archive.length }, 'Fetched archive');
  return archive;
}

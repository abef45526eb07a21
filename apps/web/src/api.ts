type ApiEnvelope<T> = {
  statusCode: number;
  message: string;
  data: T;
};

const SESSION_STORAGE_KEY = 'brandMediaAnalyzerSessionId';

let memorySessionId: string | null = null;

function extractErrorMessage(payload: unknown): string | null {
  if (!payload) return null;
  if (typeof payload === 'string') return payload;
  if (typeof payload !== 'object') return null;

  if ('message' in payload) {
    const message = payload.message;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) {
      const parts = message.filter((item) => typeof item === 'string');
      if (parts.length) return parts.join(', ');
    }
  }

  if ('error' in payload && typeof payload.error === 'string') {
    return payload.error;
  }

  return null;
}

async function readErrorMessage(
  res: Response,
  fallback: string,
): Promise<string> {
  const text = await res.text().catch(() => '');
  if (!text) return fallback;

  try {
    const json: unknown = JSON.parse(text);
    const message = extractErrorMessage(json);
    if (message) return message;
  } catch {
    // not JSON; show the raw body
  }

  return text;
}

/**
 * One id per browser tab, so each tab has its own upload and analysis.
 */
export function getSessionId(): string {
  try {
    const existing = sessionStorage.getItem(SESSION_STORAGE_KEY);
    if (existing) return existing;

    const created = crypto.randomUUID();
    sessionStorage.setItem(SESSION_STORAGE_KEY, created);
    return created;
  } catch {
    // storage blocked (private mode, etc): keep the id for this page load
    memorySessionId ??= crypto.randomUUID();
    return memorySessionId;
  }
}

function sessionHeaders(): Record<string, string> {
  return { 'X-Session-Id': getSessionId() };
}

async function unwrap<T>(res: Response, fallback: string): Promise<T> {
  if (!res.ok) {
    throw new Error(await readErrorMessage(res, fallback));
  }
  const envelope: ApiEnvelope<T> = await res.json();
  return envelope.data;
}

export async function apiGet<T = unknown>(pathname: string): Promise<T> {
  const res = await fetch(pathname, {
    method: 'GET',
    headers: sessionHeaders(),
  });
  return unwrap<T>(res, `GET ${pathname} failed (${res.status})`);
}

export async function apiPost<T = unknown>(pathname: string): Promise<T> {
  const res = await fetch(pathname, {
    method: 'POST',
    headers: sessionHeaders(),
  });
  return unwrap<T>(res, `POST ${pathname} failed (${res.status})`);
}

export async function apiDelete<T = unknown>(pathname: string): Promise<T> {
  const res = await fetch(pathname, {
    method: 'DELETE',
    headers: sessionHeaders(),
  });
  return unwrap<T>(res, `DELETE ${pathname} failed (${res.status})`);
}

export async function apiUpload<T = unknown>(
  pathname: string,
  field: string,
  file: File,
): Promise<T> {
  const body = new FormData();
  body.append(field, file, file.name);

  const res = await fetch(pathname, {
    method: 'POST',
    headers: sessionHeaders(),
    body,
  });
  return unwrap<T>(res, `Upload of ${file.name} failed (${res.status})`);
}

export async function apiGetBlob(pathname: string): Promise<Blob> {
  const res = await fetch(pathname, {
    method: 'GET',
    headers: sessionHeaders(),
  });
  if (!res.ok) {
    const fallback = `GET ${pathname} failed (${res.status})`;
    throw new Error(await readErrorMessage(res, fallback));
  }
  return res.blob();
}

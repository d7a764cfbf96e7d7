export type FetchLike = typeof fetch;

export interface ZonelightClientOptions {
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

export type PatternFamily = 'time' | 'audio';

export interface PatternInfo {
  index: number;
  name: string;
  label: string;
  family: PatternFamily;
}

export interface PatternsResponse {
  active: string;
  patterns: PatternInfo[];
}

export interface StatusResponse {
  state: 'idle' | 'running' | 'stopping' | 'terminated';
  pattern: string;
  pendingPattern: string | null;
  ticks: number;
  lights: number;
  updatesSent: number;
  updateFailures: number;
  audio: {
    source: string;
    snapshotVersion: number;
    lastSource: string;
  };
}

export interface SwitchPatternResponse {
  pattern: string;
}

export class ZonelightApiError extends Error {
  constructor(
    message: string,
    readonly httpStatus: number,
  ) {
    super(message);
    this.name = 'ZonelightApiError';
  }
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (source: JsonObject, key: string): string => {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ZonelightApiError(`Malformed response: "${key}" is not a string`, 200);
  }
  return value;
};

const readNumber = (source: JsonObject, key: string): number => {
  const value = source[key];
  if (typeof value !== 'number') {
    throw new ZonelightApiError(`Malformed response: "${key}" is not a number`, 200);
  }
  return value;
};

const readObject = (source: JsonObject, key: string): JsonObject => {
  const value = source[key];
  if (!isObject(value)) {
    throw new ZonelightApiError(`Malformed response: "${key}" is not an object`, 200);
  }
  return value;
};

const STATES = ['idle', 'running', 'stopping', 'terminated'] as const;

const parseState = (value: string): StatusResponse['state'] => {
  const state = STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new ZonelightApiError(`Malformed response: unknown state "${value}"`, 200);
  }
  return state;
};

const parsePatternInfo = (value: unknown): PatternInfo => {
  if (!isObject(value)) {
    throw new ZonelightApiError('Malformed response: pattern entry is not an object', 200);
  }
  const family = readString(value, 'family');
  return {
    index: readNumber(value, 'index'),
    name: readString(value, 'name'),
    label: readString(value, 'label'),
    family: family === 'audio' ? 'audio' : 'time',
  };
};

/** Client for the HTTP pattern control endpoint of a running session. */
export class ZonelightClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ZonelightClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'http://127.0.0.1:8787';
    const impl = options.fetchImpl ?? globalThis.fetch;
    if (!impl) {
      throw new Error('fetch API unavailable – provide fetchImpl in the client options.');
    }
    this.fetchImpl = impl.bind(globalThis);
  }

  async health(): Promise<boolean> {
    const response = await this.fetchImpl(new URL('/health', this.baseUrl), { method: 'GET' });
    if (!response.ok) {
      return false;
    }
    const payload: unknown = await response.json();
    return isObject(payload) && payload.status === 'ok';
  }

  async patterns(): Promise<PatternsResponse> {
    const payload = await this.request('GET', '/patterns');
    const patterns = payload.patterns;
    if (!Array.isArray(patterns)) {
      throw new ZonelightApiError('Malformed response: "patterns" is not an array', 200);
    }
    return { active: readString(payload, 'active'), patterns: patterns.map(parsePatternInfo) };
  }

  async status(): Promise<StatusResponse> {
    const payload = await this.request('GET', '/status');
    const audio = readObject(payload, 'audio');
    const pending = payload.pendingPattern;
    return {
      state: parseState(readString(payload, 'state')),
      pattern: readString(payload, 'pattern'),
      pendingPattern: typeof pending === 'string' ? pending : null,
      ticks: readNumber(payload, 'ticks'),
      lights: readNumber(payload, 'lights'),
      updatesSent: readNumber(payload, 'updatesSent'),
      updateFailures: readNumber(payload, 'updateFailures'),
      audio: {
        source: readString(audio, 'source'),
        snapshotVersion: readNumber(audio, 'snapshotVersion'),
        lastSource: readString(audio, 'lastSource'),
      },
    };
  }

  /** Queues a switch by pattern name or 1-based index; applied on the next tick. */
  async switchPattern(pattern: string | number): Promise<SwitchPatternResponse> {
    const payload = await this.request('POST', '/pattern', { pattern });
    return { pattern: readString(payload, 'pattern') };
  }

  private async request(method: 'GET' | 'POST', path: string, body?: JsonObject): Promise<JsonObject> {
    const response = await this.fetchImpl(new URL(path, this.baseUrl), {
      method,
      headers: body ? { 'Content-Type': 'application/json' } : undefined,
      body: body ? JSON.stringify(body) : undefined,
    });
    const json: unknown = await response.json();
    if (!isObject(json)) {
      throw new ZonelightApiError('Malformed response: expected a JSON object', response.status);
    }
    if (json.status === 'error' || !response.ok) {
      const message = typeof json.message === 'string' ? json.message : `HTTP ${response.status}`;
      throw new ZonelightApiError(message, response.status);
    }
    return json;
  }
}

export default ZonelightClient;

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { env } from '../config/env';
import { componentLogger } from '../config/logger';
import { isJsonObject, JsonObject } from '../types';

const logger = componentLogger('record-store');

export type RecordKey = string | number;

export type StoreItem = JsonObject;

export interface ReadQuery {
  filter?: JsonObject;
  fields?: string[];
  limit?: number;
  sort?: string[];
}

/**
 * Collection-oriented CRUD over the shared business record store
 */
export interface RecordStore {
  readItems(collection: string, query?: ReadQuery): Promise<StoreItem[]>;
  readItem(collection: string, key: RecordKey): Promise<StoreItem | null>;
  createItem(collection: string, data: JsonObject): Promise<StoreItem>;
  updateItem(collection: string, key: RecordKey, data: JsonObject): Promise<StoreItem>;
}

export class RecordStoreError extends Error {
  readonly status?: number;
  readonly collection: string;

  constructor(message: string, collection: string, status?: number) {
    super(message);
    this.name = 'RecordStoreError';
    this.collection = collection;
    this.status = status;
  }
}

export interface HttpRecordStoreOptions {
  baseURL: string;
  token: string;
  timeoutMs: number;
  /** Transport override, e.g. an in-process responder */
  adapter?: AxiosAdapter;
}

/**
 * Record store client speaking the `/items/{collection}` REST dialect
 * (Directus-compatible): responses are wrapped in `{ data }`.
 */
export class HttpRecordStore implements RecordStore {
  private readonly http: AxiosInstance;

  constructor(options: HttpRecordStoreOptions) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {})
      }
    });
  }

  async readItems(collection: string, query: ReadQuery = {}): Promise<StoreItem[]> {
    const params: Record<string, string | number> = {};
    if (query.filter) {
      params.filter = JSON.stringify(query.filter);
    }
    if (query.fields?.length) {
      params.fields = query.fields.join(',');
    }
    if (query.sort?.length) {
      params.sort = query.sort.join(',');
    }
    if (query.limit !== undefined) {
      params.limit = query.limit;
    }

    const data = await this.request(collection, () =>
      this.http.get(`/items/${encodeURIComponent(collection)}`, { params })
    );

    if (!Array.isArray(data)) {
      throw new RecordStoreError('Expected a list of items', collection);
    }
    return data.filter(isJsonObject);
  }

  async readItem(collection: string, key: RecordKey): Promise<StoreItem | null> {
    try {
      const data = await this.request(collection, () =>
        this.http.get(`/items/${encodeURIComponent(collection)}/${encodeURIComponent(String(key))}`)
      );
      return isJsonObject(data) ? data : null;
    } catch (error) {
      if (error instanceof RecordStoreError && (error.status === 404 || error.status === 403)) {
        return null;
      }
      throw error;
    }
  }

  async createItem(collection: string, data: JsonObject): Promise<StoreItem> {
    const created = await this.request(collection, () =>
      this.http.post(`/items/${encodeURIComponent(collection)}`, data)
    );
    return this.expectItem(created, collection);
  }

  async updateItem(collection: string, key: RecordKey, data: JsonObject): Promise<StoreItem> {
    const updated = await this.request(collection, () =>
      this.http.patch(`/items/${encodeURIComponent(collection)}/${encodeURIComponent(String(key))}`, data)
    );
    return this.expectItem(updated, collection);
  }

  private expectItem(value: unknown, collection: string): StoreItem {
    if (!isJsonObject(value)) {
      throw new RecordStoreError('Expected a single item', collection);
    }
    return value;
  }

  private async request(
    collection: string,
    send: () => Promise<{ data: unknown }>
  ): Promise<unknown> {
    try {
      const response = await send();
      return isJsonObject(response.data) ? response.data.data : undefined;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.debug('Record store request failed', {
          collection,
          status: error.response?.status,
          message: error.message
        });
        throw new RecordStoreError(error.message, collection, error.response?.status);
      }
      throw error;
    }
  }
}

export function createRecordStore(): RecordStore {
  return new HttpRecordStore({
    baseURL: env.RECORD_STORE_URL,
    token: env.RECORD_STORE_TOKEN,
    timeoutMs: env.RECORD_STORE_TIMEOUT_MS
  });
}

/**
 * Reachability probe used by the health route
 */
export async function checkRecordStoreHealth(store: RecordStore): Promise<boolean> {
  try {
    await store.readItems('agent_settings', { limit: 1 });
    return true;
  } catch (error) {
    logger.warn('Record store health check failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
}

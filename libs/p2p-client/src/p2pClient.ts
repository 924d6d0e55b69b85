import type { z } from 'zod';
import {
  DEFAULT_CHUNK_SIZE,
  Dispatcher,
  P2PError,
  fetchInBatches,
  isP2PError,
  loadConfigFromEnv,
  type QueryParams,
} from '@libs/p2p-http-core';
import {
  cacheModeFor,
  collectionEnvelopeSchema,
  collectionLayoutEnvelopeSchema,
  contentItemEnvelopeSchema,
  multiItemResponseSchema,
  searchResponseSchema,
  writeResponseSchema,
  type Collection,
  type CollectionLayout,
  type ContentItem,
  type ContentItemPayload,
  type CreateOrUpdateResult,
  type FancyCollection,
  type FancyCollectionOptions,
  type MultiItemRequestEntry,
  type P2PClientOptions,
  type ReadCallOptions,
  type SearchResponse,
  type WriteResponse,
} from './types';
import { parseRequest, parseResponse } from './utils';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONTENT_ITEM_QUERY: QueryParams = { include: ['web_url'] };

export const DEFAULT_COLLECTION_LAYOUT_QUERY: QueryParams = { include: 'items' };

export const DEFAULT_CONTENT_ITEM_FIELDS: ContentItemPayload = {
  content_item_type_code: 'blurb',
  content_item_state_code: 'live',
  body: '',
};

/** Sent with every multi-item entry so the service never answers 304. */
export const MULTI_IF_MODIFIED_SINCE = '1900-01-01T00:00:00Z';

const MULTI_ITEM_PATH = '/content_items/multi.json';

// ============================================================================
// Client
// ============================================================================

/**
 * Typed access to the P2P Content Services API.
 *
 * Every method marshals its arguments into one {@link Dispatcher} call (or one
 * per chunk for bulk lookups); caching, retries and error classification
 * happen there.
 */
export class P2PClient {
  readonly dispatcher: Dispatcher;
  private readonly defaultContentItemQuery: QueryParams;
  private readonly contentItemDefaults: ContentItemPayload;

  constructor(options: P2PClientOptions) {
    const { defaultContentItemQuery, contentItemDefaults, ...connection } = options;
    this.dispatcher = new Dispatcher(connection);
    this.defaultContentItemQuery = defaultContentItemQuery ?? DEFAULT_CONTENT_ITEM_QUERY;
    this.contentItemDefaults = contentItemDefaults ?? DEFAULT_CONTENT_ITEM_FIELDS;
  }

  async getContentItem(slug: string, options: ReadCallOptions = {}): Promise<ContentItem> {
    const raw = await this.dispatcher.get(`/content_items/${encodeURIComponent(slug)}.json`, this.contentQuery(options.query), {
      cacheMode: cacheModeFor(options.forceUpdate),
      signal: options.signal,
      operation: 'getContentItem',
    });
    return decode(contentItemEnvelopeSchema, raw, 'getContentItem').content_item;
  }

  /**
   * Looks up many content items by id, 25 per request. The result is aligned
   * with `ids`: items the service reports missing (404) or unchanged (304)
   * are `null`.
   */
  async getMultiContentItems(ids: readonly number[], options: ReadCallOptions = {}): Promise<(ContentItem | null)[]> {
    const query = this.contentQuery(options.query);
    return fetchInBatches<number, ContentItem>({
      ids,
      chunkSize: DEFAULT_CHUNK_SIZE,
      keyOf: (item) => item.id,
      fetchChunk: async (chunkIds) => {
        const entries: MultiItemRequestEntry[] = chunkIds.map((id) => ({ id, if_modified_since: MULTI_IF_MODIFIED_SINCE }));
        const raw = await this.dispatcher.post(
          MULTI_ITEM_PATH,
          { ...query, content_items: entries },
          {
            cacheable: true,
            cacheMode: cacheModeFor(options.forceUpdate),
            signal: options.signal,
            operation: 'getMultiContentItems',
          }
        );
        const results = decode(multiItemResponseSchema, raw, 'getMultiContentItems');
        const items: ContentItem[] = [];
        for (const result of results) {
          if (result.status === 200) {
            items.push(decode(contentItemEnvelopeSchema, result.body, 'getMultiContentItems').content_item);
          } else if (result.status !== 404 && result.status !== 304) {
            throw new P2PError('unknown', { message: `${result.status} fetching ${result.id}`, status: result.status });
          }
        }
        return items;
      },
    });
  }

  async createContentItem(item: ContentItemPayload): Promise<WriteResponse> {
    const raw = await this.dispatcher.post('/content_items.json', this.writeBody({ ...this.contentItemDefaults, ...item }), {
      operation: 'createContentItem',
    });
    return decode(writeResponseSchema, raw, 'createContentItem');
  }

  /**
   * Updates a content item. The slug comes from `slug` when given (a renamed
   * item), otherwise from the item itself, and is not sent in the body.
   */
  async updateContentItem(item: ContentItemPayload, slug?: string): Promise<WriteResponse> {
    const { slug: itemSlug, ...fields } = item;
    const target = slug ?? (typeof itemSlug === 'string' ? itemSlug : undefined);
    if (!target) {
      throw new Error('updateContentItem requires a slug');
    }
    const content = slug === undefined ? fields : item;
    const raw = await this.dispatcher.put(`/content_items/${encodeURIComponent(target)}.json`, this.writeBody(content), {
      operation: 'updateContentItem',
    });
    return decode(writeResponseSchema, raw, 'updateContentItem');
  }

  async createOrUpdateContentItem(item: ContentItemPayload): Promise<CreateOrUpdateResult> {
    try {
      const response = await this.updateContentItem(item);
      return { created: false, response };
    } catch (error) {
      if (!isP2PError(error, 'not_found')) {
        throw error;
      }
    }
    const response = await this.createContentItem(item);
    return { created: true, response };
  }

  junkContentItem(slug: string): Promise<WriteResponse> {
    return this.updateContentItem({ slug, content_item_state_code: 'junk' });
  }

  async search(params: QueryParams, options: Omit<ReadCallOptions, 'query'> = {}): Promise<SearchResponse> {
    const raw = await this.dispatcher.get('/content_items/search.json', params, {
      cacheMode: cacheModeFor(options.forceUpdate),
      signal: options.signal,
      operation: 'search',
    });
    return decode(searchResponseSchema, raw, 'search');
  }

  async getCollection(slug: string, options: ReadCallOptions = {}): Promise<Collection> {
    const raw = await this.dispatcher.get(`/collections/${encodeURIComponent(slug)}.json`, options.query, {
      cacheMode: cacheModeFor(options.forceUpdate),
      signal: options.signal,
      operation: 'getCollection',
    });
    return decode(collectionEnvelopeSchema, raw, 'getCollection').collection;
  }

  async getCollectionLayout(slug: string, options: ReadCallOptions = {}): Promise<CollectionLayout> {
    const raw = await this.dispatcher.get(
      `/current_collections/${encodeURIComponent(slug)}.json`,
      options.query ?? DEFAULT_COLLECTION_LAYOUT_QUERY,
      { cacheMode: cacheModeFor(options.forceUpdate), signal: options.signal, operation: 'getCollectionLayout' }
    );
    const layout = decode(collectionLayoutEnvelopeSchema, raw, 'getCollectionLayout').collection_layout;
    // The service leaves the code out of the layout payload.
    return { ...layout, code: slug };
  }

  /**
   * A collection layout with the content item of every layout item attached,
   * and optionally the collection record itself.
   */
  async getFancyCollection(slug: string, options: FancyCollectionOptions = {}): Promise<FancyCollection> {
    const { withCollection = false, limitItems = 25, forceUpdate, signal } = options;
    const layout = await this.getCollectionLayout(slug, { forceUpdate, signal });
    const collection = withCollection ? await this.getCollection(slug, { forceUpdate, signal }) : undefined;

    const items = limitItems > 0 ? layout.items.slice(0, limitItems) : layout.items;
    const contentItems = await this.getMultiContentItems(
      items.map((item) => item.contentitem_id),
      { query: options.contentItemQuery, signal }
    );

    const fancy: FancyCollection = {
      ...layout,
      items: items.map((item, index) => {
        const contentItem = contentItems[index];
        return contentItem ? { ...item, content_item: contentItem } : { ...item };
      }),
    };
    if (collection) {
      fancy.collection = collection;
    }
    return fancy;
  }

  private contentQuery(query?: QueryParams): QueryParams {
    return query && Object.keys(query).length > 0 ? query : this.defaultContentItemQuery;
  }

  private writeBody(content: ContentItemPayload): Record<string, unknown> {
    const body: Record<string, unknown> = { content_item: parseRequest(content) };
    if (this.dispatcher.config.preserveEmbeddedTags) {
      body.preserve_embedded_tags = true;
    }
    return body;
  }
}

function decode<S extends z.ZodTypeAny>(schema: S, raw: unknown, operation: string): z.output<S> {
  const parsed = schema.safeParse(parseResponse(raw));
  if (!parsed.success) {
    throw new P2PError('unknown', { message: `Unexpected response shape from ${operation}`, cause: parsed.error });
  }
  return parsed.data;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a P2P client from environment variables.
 *
 * Required: `P2P_API_URL`, `P2P_API_KEY`. Optional: `P2P_API_DEBUG`,
 * `P2P_SECONDARY_API_URL`, `P2P_PRESERVE_EMBEDDED_TAGS`, `P2P_TIMEOUT_MS`,
 * `P2P_MAX_ATTEMPTS`, `P2P_RETRY_DELAY_MS`, `P2P_AUTH_URL`.
 */
export function createP2PClient(
  configOverrides?: Partial<P2PClientOptions>,
  env: Record<string, string | undefined> = process.env
): P2PClient {
  const settings = loadConfigFromEnv(env);
  return new P2PClient({ ...settings, ...configOverrides });
}

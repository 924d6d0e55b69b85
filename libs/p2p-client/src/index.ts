/**
 * @libs/p2p-client
 *
 * Typed client for the P2P Content Services API.
 *
 * ```typescript
 * import { createP2PClient } from '@libs/p2p-client';
 *
 * // Reads P2P_API_URL / P2P_API_KEY
 * const client = createP2PClient({ cache: new MemoryCache() });
 *
 * const item = await client.getContentItem('la-na-example-story');
 * const items = await client.getMultiContentItems([101, 102, 103]);
 * const layout = await client.getFancyCollection('la_home_top', { withCollection: true });
 * ```
 */

export {
  P2PClient,
  createP2PClient,
  DEFAULT_CONTENT_ITEM_QUERY,
  DEFAULT_COLLECTION_LAYOUT_QUERY,
  DEFAULT_CONTENT_ITEM_FIELDS,
  MULTI_IF_MODIFIED_SINCE,
} from './p2pClient';

export { authenticate, P2PAuthError, type AuthenticateParams } from './auth';

export { slugify, formatDate, parseDate, parseResponse, parseRequest } from './utils';

export type {
  P2PClientOptions,
  ReadCallOptions,
  FancyCollectionOptions,
  ContentItem,
  ContentItemPayload,
  MultiItemResult,
  WriteResponse,
  CreateOrUpdateResult,
  SearchResponse,
  Collection,
  CollectionLayout,
  CollectionLayoutItem,
  FancyCollection,
  FancyCollectionItem,
  P2PUser,
} from './types';

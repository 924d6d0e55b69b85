import { z } from 'zod';
import type { CacheMode, ConnectionConfigInput, QueryParams } from '@libs/p2p-http-core';

/**
 * P2P Content Services types
 *
 * Response schemas pin the fields the client reads and pass every other
 * field through untouched.
 */

// ============================================================================
// Client configuration
// ============================================================================

export type ContentItemPayload = Record<string, unknown>;

export interface P2PClientOptions extends ConnectionConfigInput {
  /** Query used by content item reads when the caller passes none. */
  defaultContentItemQuery?: QueryParams;
  /** Fields merged under every created content item. */
  contentItemDefaults?: ContentItemPayload;
}

export interface ReadCallOptions {
  query?: QueryParams;
  /** Skip the cache lookup but store the fresh response. */
  forceUpdate?: boolean;
  signal?: AbortSignal;
}

export interface FancyCollectionOptions {
  withCollection?: boolean;
  /** Layout items kept (and content items fetched). 0 keeps all. */
  limitItems?: number;
  contentItemQuery?: QueryParams;
  forceUpdate?: boolean;
  signal?: AbortSignal;
}

export const cacheModeFor = (forceUpdate?: boolean): CacheMode => (forceUpdate ? 'refresh' : 'default');

// ============================================================================
// Content items
// ============================================================================

export const contentItemSchema = z
  .object({
    id: z.number(),
    slug: z.string().optional(),
    title: z.string().nullish(),
    content_item_type_code: z.string().optional(),
    content_item_state_code: z.string().optional(),
    web_url: z.string().nullish(),
  })
  .passthrough();

export type ContentItem = z.infer<typeof contentItemSchema>;

export const contentItemEnvelopeSchema = z.object({ content_item: contentItemSchema }).passthrough();

/** One entry of a multi-item lookup response. */
export const multiItemResultSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    status: z.number(),
    body: z.unknown().optional(),
  })
  .passthrough();

export const multiItemResponseSchema = z.array(multiItemResultSchema);

export type MultiItemResult = z.infer<typeof multiItemResultSchema>;

export interface MultiItemRequestEntry {
  id: number;
  if_modified_since: string;
}

export const writeResponseSchema = z.record(z.string(), z.unknown()).nullable();

export type WriteResponse = z.infer<typeof writeResponseSchema>;

export interface CreateOrUpdateResult {
  created: boolean;
  response: WriteResponse;
}

export const searchResponseSchema = z.record(z.string(), z.unknown());

export type SearchResponse = z.infer<typeof searchResponseSchema>;

// ============================================================================
// Collections
// ============================================================================

export const collectionSchema = z
  .object({
    id: z.number().optional(),
    code: z.string().optional(),
    name: z.string().nullish(),
  })
  .passthrough();

export type Collection = z.infer<typeof collectionSchema>;

export const collectionEnvelopeSchema = z.object({ collection: collectionSchema }).passthrough();

export const collectionLayoutItemSchema = z
  .object({
    contentitem_id: z.number(),
  })
  .passthrough();

export type CollectionLayoutItem = z.infer<typeof collectionLayoutItemSchema>;

export const collectionLayoutSchema = z
  .object({
    code: z.string().optional(),
    items: z.array(collectionLayoutItemSchema).default([]),
  })
  .passthrough();

export type CollectionLayout = z.infer<typeof collectionLayoutSchema>;

export const collectionLayoutEnvelopeSchema = z.object({ collection_layout: collectionLayoutSchema }).passthrough();

export interface FancyCollectionItem {
  contentitem_id: number;
  content_item?: ContentItem;
  [field: string]: unknown;
}

export interface FancyCollection {
  code?: string;
  items: FancyCollectionItem[];
  collection?: Collection;
  [field: string]: unknown;
}

// ============================================================================
// Authentication
// ============================================================================

export const p2pUserSchema = z
  .object({
    username: z.string(),
    email: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
  })
  .passthrough();

export type P2PUser = z.infer<typeof p2pUserSchema>;

export const authResponseSchema = z.object({ p2p_user: p2pUserSchema });

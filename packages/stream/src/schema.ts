// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Event payload schema.
 *
 * Schemas validate the wire shape (snake_case, decimal strings, `{ address }`
 * objects) and transform it into the decoded shape: camelCase fields, `Date`
 * timestamps, `bigint` amounts and lowercase hex addresses.
 */

import { z } from "zod";
import { CHAINS, type EventType } from "./events.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HASH_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const UINT_PATTERN = /^\d+$/;
const UINT256_LIMIT = 2n ** 256n;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

// Primitives

export const AddressSchema = z
  .string()
  .regex(ADDRESS_PATTERN)
  .transform((address) => address.toLowerCase());

/** `{ address }` object as sent for makers, takers and accounts. */
export const AccountSchema = z
  .object({ address: AddressSchema })
  .transform((account) => account.address);

const OptionalAccountSchema = AccountSchema.nullish().transform(
  (account) => account ?? undefined,
);

export const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp")
  .transform((value) => new Date(value));

/** Unsigned 256-bit amount sent as a decimal string. */
export const Uint256Schema = z
  .string()
  .regex(UINT_PATTERN)
  .transform((value) => BigInt(value))
  .refine((value) => value < UINT256_LIMIT, "Exceeds 256 bits");

/** Token prices arrive as decimal strings or plain numbers. */
export const TokenPriceSchema = z.union([
  z.number(),
  z
    .string()
    .regex(DECIMAL_PATTERN)
    .transform((value) => Number(value)),
]);

export const ChainSchema = z.enum(CHAINS);

export const ListingTypeSchema = z
  .enum(["english", "dutch"])
  .nullish()
  .transform((listingType) => listingType ?? null);

const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const QuantitySchema = z.number().int().nonnegative();

// Shared structures

/** `chain/contract/tokenId`, e.g. `ethereum/0xabc…/42`. */
export const NftIdSchema = z
  .string()
  .transform((value) => value.split("/"))
  .pipe(z.tuple([ChainSchema, AddressSchema, Uint256Schema]))
  .transform(([chain, contract, tokenId]) => ({ chain, contract, tokenId }));

export const MetadataSchema = z
  .object({
    name: OptionalTextSchema,
    description: OptionalTextSchema,
    image_url: OptionalTextSchema,
    animation_url: OptionalTextSchema,
    metadata_url: OptionalTextSchema,
  })
  .transform((metadata) => ({
    name: metadata.name,
    description: metadata.description,
    imageUrl: metadata.image_url,
    animationUrl: metadata.animation_url,
    metadataUrl: metadata.metadata_url,
  }));

export const ItemSchema = z
  .object({
    nft_id: NftIdSchema,
    permalink: z.string(),
    chain: z.object({ name: ChainSchema }),
    metadata: MetadataSchema,
  })
  .transform((item) => ({
    nftId: item.nft_id,
    permalink: item.permalink,
    chain: item.chain.name,
    metadata: item.metadata,
  }));

export const TransactionSchema = z
  .object({
    hash: z
      .string()
      .regex(HASH_PATTERN)
      .transform((hash) => hash.toLowerCase()),
    timestamp: TimestampSchema,
  })
  .transform((transaction) => ({
    hash: transaction.hash,
    timestamp: transaction.timestamp,
  }));

export const PaymentTokenSchema = z
  .object({
    address: AddressSchema,
    decimals: z.number().int().nonnegative(),
    eth_price: TokenPriceSchema,
    name: z.string(),
    symbol: z.string(),
    usd_price: TokenPriceSchema,
  })
  .transform((token) => ({
    address: token.address,
    decimals: token.decimals,
    ethPrice: token.eth_price,
    name: token.name,
    symbol: token.symbol,
    usdPrice: token.usd_price,
  }));

/** Present on every event payload. */
const contextShape = {
  collection: z.object({ slug: z.string() }),
  item: ItemSchema,
};

// Event payloads

export const ItemListedSchema = z
  .object({
    ...contextShape,
    event_timestamp: TimestampSchema,
    base_price: Uint256Schema,
    expiration_date: TimestampSchema,
    is_private: z.boolean(),
    listing_date: TimestampSchema,
    listing_type: ListingTypeSchema,
    maker: AccountSchema,
    payment_token: PaymentTokenSchema,
    quantity: QuantitySchema,
    taker: OptionalAccountSchema,
  })
  .transform((p) => ({
    collection: p.collection.slug,
    item: p.item,
    eventTimestamp: p.event_timestamp,
    basePrice: p.base_price,
    expirationDate: p.expiration_date,
    isPrivate: p.is_private,
    listingDate: p.listing_date,
    listingType: p.listing_type,
    maker: p.maker,
    paymentToken: p.payment_token,
    quantity: p.quantity,
    taker: p.taker,
  }));

export const ItemSoldSchema = z
  .object({
    ...contextShape,
    event_timestamp: TimestampSchema,
    closing_date: TimestampSchema,
    is_private: z.boolean(),
    listing_type: ListingTypeSchema,
    maker: AccountSchema,
    payment_token: PaymentTokenSchema,
    quantity: QuantitySchema,
    sale_price: Uint256Schema,
    taker: AccountSchema,
    transaction: TransactionSchema,
  })
  .transform((p) => ({
    collection: p.collection.slug,
    item: p.item,
    eventTimestamp: p.event_timestamp,
    closingDate: p.closing_date,
    isPrivate: p.is_private,
    listingType: p.listing_type,
    maker: p.maker,
    paymentToken: p.payment_token,
    quantity: p.quantity,
    salePrice: p.sale_price,
    taker: p.taker,
    transaction: p.transaction,
  }));

export const ItemTransferredSchema = z
  .object({
    ...contextShape,
    event_timestamp: TimestampSchema,
    transaction: TransactionSchema,
    from_account: AccountSchema,
    to_account: AccountSchema,
    quantity: QuantitySchema,
  })
  .transform((p) => ({
    collection: p.collection.slug,
    item: p.item,
    eventTimestamp: p.event_timestamp,
    transaction: p.transaction,
    fromAccount: p.from_account,
    toAccount: p.to_account,
    quantity: p.quantity,
  }));

export const ItemMetadataUpdatedSchema = z
  .object({
    ...contextShape,
    name: OptionalTextSchema,
    description: OptionalTextSchema,
    image_preview_url: OptionalTextSchema,
    animation_url: OptionalTextSchema,
    background_color: OptionalTextSchema,
    metadata_url: OptionalTextSchema,
    // Shape not documented by the feed; kept as sent
    traits: z.array(z.unknown()).default([]),
  })
  .transform((p) => ({
    collection: p.collection.slug,
    item: p.item,
    name: p.name,
    description: p.description,
    imagePreviewUrl: p.image_preview_url,
    animationUrl: p.animation_url,
    backgroundColor: p.background_color,
    metadataUrl: p.metadata_url,
    traits: p.traits,
  }));

export const ItemCancelledSchema = z
  .object({
    ...contextShape,
    event_timestamp: TimestampSchema,
    listing_type: ListingTypeSchema,
    payment_token: PaymentTokenSchema,
    quantity: QuantitySchema,
    transaction: TransactionSchema,
  })
  .transform((p) => ({
    collection: p.collection.slug,
    item: p.item,
    eventTimestamp: p.event_timestamp,
    listingType: p.listing_type,
    paymentToken: p.payment_token,
    quantity: p.quantity,
    transaction: p.transaction,
  }));

const offerShape = {
  ...contextShape,
  event_timestamp: TimestampSchema,
  base_price: Uint256Schema,
  created_date: TimestampSchema,
  expiration_date: TimestampSchema,
  maker: AccountSchema,
  payment_token: PaymentTokenSchema,
  quantity: QuantitySchema,
  taker: OptionalAccountSchema,
};

export const ItemReceivedOfferSchema = z.object(offerShape).transform((p) => ({
  collection: p.collection.slug,
  item: p.item,
  eventTimestamp: p.event_timestamp,
  basePrice: p.base_price,
  createdDate: p.created_date,
  expirationDate: p.expiration_date,
  maker: p.maker,
  paymentToken: p.payment_token,
  quantity: p.quantity,
  taker: p.taker,
}));

// Bids carry the same fields as offers
export const ItemReceivedBidSchema = ItemReceivedOfferSchema;

// Decoded types

export type NftId = z.output<typeof NftIdSchema>;
export type Item = z.output<typeof ItemSchema>;
export type ItemMetadata = z.output<typeof MetadataSchema>;
export type Transaction = z.output<typeof TransactionSchema>;
export type PaymentToken = z.output<typeof PaymentTokenSchema>;
export type ListingType = NonNullable<z.output<typeof ListingTypeSchema>>;

export type ItemListed = z.output<typeof ItemListedSchema>;
export type ItemSold = z.output<typeof ItemSoldSchema>;
export type ItemTransferred = z.output<typeof ItemTransferredSchema>;
export type ItemMetadataUpdated = z.output<typeof ItemMetadataUpdatedSchema>;
export type ItemCancelled = z.output<typeof ItemCancelledSchema>;
export type ItemReceivedOffer = z.output<typeof ItemReceivedOfferSchema>;
export type ItemReceivedBid = z.output<typeof ItemReceivedBidSchema>;

export interface EventPayloads {
  item_listed: ItemListed;
  item_sold: ItemSold;
  item_transferred: ItemTransferred;
  item_metadata_updated: ItemMetadataUpdated;
  item_cancelled: ItemCancelled;
  item_received_offer: ItemReceivedOffer;
  item_received_bid: ItemReceivedBid;
}

export type KnownStreamEvent = {
  [K in EventType]: { kind: K; sentAt: Date; payload: EventPayloads[K] };
}[EventType];

/** Event of a type this client does not know; payload kept undecoded. */
export interface UnrecognizedEvent {
  kind: "unrecognized";
  eventType: string;
  raw: unknown;
}

export type StreamEvent = KnownStreamEvent | UnrecognizedEvent;

export type StreamEventOf<K extends EventType> = Extract<
  KnownStreamEvent,
  { kind: K }
>;

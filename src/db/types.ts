// Typed aliases for frequently-used identifiers to make intent explicit.
export type UserId = string;
export type ChannelId = string;
export type MessageId = string;
export type ListingId = string;
export type TradeId = string;

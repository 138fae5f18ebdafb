/**
 * Core type definitions for iline-relay
 */

// ============================================================================
// Prefix Flags
// ============================================================================

/**
 * Provenance and quality flags shown in front of a reply line.
 * Declaration order is the order labels are rendered in.
 */
export enum PrefixFlag {
  ARGUMENT = 1,
  WEBCHAT = 2,
  PUBLIC = 4,
  STATS_L = 8,
  NICK = 16,
  REPLY = 32,
  ERROR = 64,
  TRUNCATED = 128,
  GARBAGE = 256
}

/** Bitwise OR of PrefixFlag values; 0 means no prefix */
export type PrefixBits = number;

// ============================================================================
// Chat Transport Types
// ============================================================================

export interface ChannelMember {
  nick: string;
  /** user@host as reported by the server */
  host: string;
  op: boolean;
  halfop: boolean;
  voice: boolean;
}

export interface ChatChannel {
  readonly name: string;
  /** Whether the member roster has been fully received */
  readonly synced: boolean;
  /** Case-insensitive member lookup */
  findMember(nick: string): ChannelMember | undefined;
  say(line: string): void;
}

export interface ChatServer {
  readonly tag: string;
  /** Our own nick on this connection */
  readonly nick: string;
  /** Our own user@host on this connection */
  readonly userhost: string;
  /** Measured lag in milliseconds */
  readonly lagMs: number;
  findChannel(name: string): ChatChannel | undefined;
  sendRaw(line: string): void;
}

/** Re-resolves servers by tag when a reply arrives later */
export interface ChatDirectory {
  findServer(tag: string): ChatServer | undefined;
}

export interface PublicMessage {
  server: ChatServer;
  text: string;
  nick: string;
  /** Sender's user@host */
  address: string;
  /** Channel the message was sent to */
  target: string;
}

// ============================================================================
// Lookup Types
// ============================================================================

export type LookupState = 'pending' | 'awaiting-status-reply' | 'fetching';

export interface LookupRequest {
  id: number;
  serverTag: string;
  channelName: string;
  nick: string;
  /** Nick that asked for this lookup by naming nick, if someone else */
  requestedBy?: string;
  state: LookupState;
}

/** Identity needed to open a request */
export type LookupTarget = Pick<LookupRequest, 'serverTag' | 'channelName' | 'nick' | 'requestedBy'>;

export interface LookupReply {
  text: string;
  bits: PrefixBits;
}

/**
 * How the dispatcher was entered. A continuation is the single re-entry
 * made while resolving a nickname argument.
 */
export type DispatchMode =
  | { kind: 'top-level' }
  | { kind: 'continuation'; requestedBy: string };

export type DropReason =
  | 'busy'
  | 'lagged'
  | 'unmonitored'
  | 'not-synced'
  | 'no-privileges'
  | 'unknown-sender'
  | 'not-a-command'
  | 'flooded'
  | 'unknown-command';

export type DispatchResult =
  | { status: 'dropped'; reason: DropReason }
  | { status: 'replied' }
  | { status: 'awaiting-status-reply'; nick: string }
  | { status: 'looked-up'; address: string; provenance: PrefixFlag; reply: LookupReply | null };

// ============================================================================
// Configuration Types
// ============================================================================

export interface IlineConfig {
  /** network/#channel entries to monitor */
  channels: string[];
  command: string;
  commandChar: string;
  /** 0 disables the lag check */
  lagLimitSeconds: number;
  /** Lookup service base URL, the address is appended */
  url: string;
  requirePrivileges: boolean;
  /** Show the [command] banner on lines sent */
  showBanner: boolean;
  commandHelp: boolean;
  commandVersion: boolean;
  testWebchat: boolean;
  showPrefix: boolean;
  showPrefixLong: boolean;
  showExtended: boolean;
  hideProcessing: boolean;
  hideLooking: boolean;
  hideLookingNicks: boolean;
  floodTimeoutSeconds: number;
  floodCount: number;
  statusTimeoutSeconds: number;
  workerTimeoutSeconds: number;
}

export enum ConfigSource {
  USER = 'user',        // ~/.config/iline-relay/config
  PROJECT = 'project'   // ./.iline-relay
}

export interface ParseError {
  line: number;
  message: string;
  source: ConfigSource;
}

export interface ConfigParseResult {
  values: Partial<IlineConfig>;
  errors: ParseError[];
}

// ============================================================================
// Audit Logging Types
// ============================================================================

export type LookupOutcome =
  | 'reply'
  | 'no-reply'
  | 'invalid-address'
  | 'unknown-nick'
  | 'rejected'
  | 'timeout'
  | 'worker-failed';

export interface LookupLogEntry {
  timestamp: string;      // ISO 8601
  server: string;
  channel: string;
  nick: string;
  requestedBy?: string;
  outcome: LookupOutcome;
  address?: string;
  provenance?: string;
  reply?: string;
}

export interface LogReadOptions {
  limit?: number;         // Default: 50
  outcome?: LookupOutcome;
  since?: Date;
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  configPath?: string;    // Override project config file location
  limit?: number;
  outcome?: LookupOutcome;
  since?: Date;
}

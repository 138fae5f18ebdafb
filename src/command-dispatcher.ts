/**
 * CommandDispatcher - Turns channel commands into lookups and replies
 *
 * Entry points, all called by the chat transport:
 * - handlePublic: a message on a channel
 * - handleOwnPublic: a message we sent ourselves
 * - handleNumeric: a numeric reply that may answer our STATS L query
 *
 * Messages pass an admission pipeline (in flight, lag, channel, sync,
 * privileges, membership, command prefix, flood) before the command is
 * looked at. Every drop is silent towards the channel; the returned
 * DispatchResult says why.
 */

import {
  ChannelMember,
  ChatChannel,
  ChatDirectory,
  ChatServer,
  DispatchMode,
  DispatchResult,
  DropReason,
  IlineConfig,
  LookupLogEntry,
  LookupOutcome,
  LookupReply,
  LookupRequest,
  LookupTarget,
  PrefixBits,
  PrefixFlag,
  PublicMessage
} from './types';
import {
  hexToIPv4,
  isHexHost,
  isWebGatewayHost,
  looksLikeAddress,
  splitUserHost
} from './address-classifier';
import { FloodController } from './flood-controller';
import { ReplyFormatter } from './reply-formatter';
import { RequestCoordinator } from './request-coordinator';
import {
  ERR_NOPRIVILEGES,
  RPL_STATSLINKINFO,
  StatusCorrelator,
  StatusReplyOutcome
} from './status-correlator';
import { LookupExecutor } from './lookup-executor';
import { AuditLogger } from './audit-logger';

export const VERSION = '0.5.0';

export const VERSION_LINES = [
  `iline-relay v${VERSION}`,
  'IRC frontend to an I-line lookup service',
  'Looks up the I-lines covering a nick, a webchat user or an IPv4/IPv6 address'
];

const TOP_LEVEL: DispatchMode = { kind: 'top-level' };

export interface DispatcherOptions {
  directory: ChatDirectory;
  flood?: FloodController;
  coordinator?: RequestCoordinator;
  correlator?: StatusCorrelator;
  executor?: LookupExecutor;
  formatter?: ReplyFormatter;
  logger?: AuditLogger;
}

/** Everything a lookup command needs to know about where it came from */
interface CommandContext {
  server: ChatServer;
  channel: ChatChannel;
  channelName: string;
  nick: string;
  address: string;
}

export class CommandDispatcher {
  private directory: ChatDirectory;
  private flood: FloodController;
  private coordinator: RequestCoordinator;
  private correlator: StatusCorrelator;
  private executor: LookupExecutor;
  private formatter: ReplyFormatter;
  private logger: AuditLogger | null;

  constructor(options: DispatcherOptions) {
    this.directory = options.directory;
    this.flood = options.flood || new FloodController();
    this.coordinator = options.coordinator || new RequestCoordinator();
    this.correlator = options.correlator || new StatusCorrelator();
    this.executor = options.executor || new LookupExecutor();
    this.formatter = options.formatter || new ReplyFormatter();
    this.logger = options.logger || null;
  }

  /**
   * Handle a channel message.
   *
   * Admission order:
   * 1. Drop if a lookup is in flight (continuations skip this)
   * 2. Drop if the connection is lagging (continuations skip this)
   * 3. Drop unless network/#channel is monitored
   * 4. Drop until the channel roster is synced
   * 5. Drop unless we hold op, half-op or voice (when required)
   * 6. Drop unless the sender is on the channel
   * 7. Drop unless the text starts with the command character
   * 8. Drop when flood limited
   */
  async handlePublic(message: PublicMessage, config: IlineConfig, mode: DispatchMode = TOP_LEVEL): Promise<DispatchResult> {
    const { server } = message;
    const continuation = mode.kind === 'continuation';

    if (!continuation && this.coordinator.isBusy()) {
      return drop('busy');
    }

    if (!continuation && config.lagLimitSeconds > 0 && server.lagMs >= config.lagLimitSeconds * 1000) {
      return drop('lagged');
    }

    const channelName = message.target.toLowerCase();
    if (!this.isMonitored(server.tag, channelName, config)) {
      return drop('unmonitored');
    }

    const channel = server.findChannel(channelName);
    if (!channel) {
      return drop('unmonitored');
    }

    if (!channel.synced) {
      return drop('not-synced');
    }

    if (config.requirePrivileges && !hasPrivileges(channel.findMember(server.nick))) {
      return drop('no-privileges');
    }

    if (!channel.findMember(message.nick)) {
      return drop('unknown-sender');
    }

    if (!message.text.startsWith(config.commandChar)) {
      return drop('not-a-command');
    }

    if (!this.flood.admit(config)) {
      return drop('flooded');
    }

    const { command, argument } = splitCommand(message.text.substring(config.commandChar.length));
    const context: CommandContext = {
      server,
      channel,
      channelName,
      nick: message.nick,
      address: message.address
    };

    if (command === config.command.trim().toLowerCase()) {
      return this.handleLookupCommand(context, argument, config, mode);
    }

    if (config.commandHelp && command === 'help') {
      const name = config.command.trim().toLowerCase();
      const char = config.commandChar;
      this.reply(context, `Commands: ${char}${name}, ${char}help & ${char}version`, 0, config);
      this.reply(context, `Syntax:   ${char}${name} [<IP(4/6)>|<nickname>]`, 0, config);
      return { status: 'replied' };
    }

    if (config.commandVersion && command === 'version') {
      for (const line of VERSION_LINES) {
        this.reply(context, line, 0, config);
      }
      return { status: 'replied' };
    }

    return drop('unknown-command');
  }

  /**
   * Messages we send ourselves are commands too
   */
  handleOwnPublic(server: ChatServer, text: string, target: string, config: IlineConfig): Promise<DispatchResult> {
    return this.handlePublic({ server, text, nick: server.nick, address: server.userhost, target }, config);
  }

  /**
   * Feed a numeric reply to the status correlator. Resolves once any
   * lookup it triggers has been answered.
   */
  async handleNumeric(server: ChatServer, numeric: string, data: string, config: IlineConfig): Promise<StatusReplyOutcome> {
    let outcome: StatusReplyOutcome;

    if (numeric === RPL_STATSLINKINFO) {
      outcome = this.correlator.handleStatsLinkInfo(server.tag, data);
    } else if (numeric === ERR_NOPRIVILEGES) {
      outcome = this.correlator.handleNoPrivileges();
    } else {
      return { kind: 'ignored' };
    }

    switch (outcome.kind) {
      case 'ignored':
        break;

      case 'rejected':
        this.finish(outcome.request, 'rejected');
        break;

      case 'invalid': {
        const extended = this.describeMember(outcome.request, config);
        this.sendTo(outcome.request, `You do not seem to have an IP${extended}`, PrefixFlag.ERROR, config);
        this.finish(outcome.request, 'invalid-address', { address: outcome.host });
        break;
      }

      case 'resolved': {
        if (!this.findChannel(outcome.request)) {
          // Left the channel while waiting
          this.coordinator.close(outcome.request);
          break;
        }
        const extended = this.describeMember(outcome.request, config);
        await this.lookup(outcome.request, outcome.address, PrefixFlag.STATS_L, extended, config);
        break;
      }
    }

    return outcome;
  }

  /**
   * Stop timers so the process can exit
   */
  dispose(): void {
    this.correlator.cancel();
    this.flood.reset();
  }

  private async handleLookupCommand(
    context: CommandContext,
    argument: string,
    config: IlineConfig,
    mode: DispatchMode
  ): Promise<DispatchResult> {
    if (mode.kind === 'top-level' && !config.hideProcessing) {
      this.reply(context, 'Processing...', 0, config);
    }

    const request = this.coordinator.open({
      serverTag: context.server.tag,
      channelName: context.channelName,
      nick: context.nick,
      requestedBy: mode.kind === 'continuation' && mode.requestedBy.toLowerCase() !== context.nick.toLowerCase()
        ? mode.requestedBy
        : undefined
    });

    if (argument === '') {
      return this.lookupOwnAddress(context, request, config);
    }

    const lowered = argument.toLowerCase();
    if (looksLikeAddress(lowered)) {
      const reply = await this.lookup(request, lowered, PrefixFlag.ARGUMENT, '', config);
      return { status: 'looked-up', address: lowered, provenance: PrefixFlag.ARGUMENT, reply };
    }

    const member = context.channel.findMember(lowered);
    if (!member) {
      this.reply(context, 'Not an IP(4/6) address or nickname', PrefixFlag.ERROR, config);
      this.finish(request, 'unknown-nick');
      return { status: 'replied' };
    }

    // The continuation below is admitted again, so this request is given back
    this.flood.refund();
    this.coordinator.close(request);

    if (
      member.nick.toLowerCase() !== context.nick.toLowerCase() &&
      !config.hideLooking &&
      !config.hideLookingNicks
    ) {
      this.reply(context, `Looking up ${member.nick}`, PrefixFlag.NICK, config);
    }

    return this.handlePublic(
      {
        server: context.server,
        text: `${config.commandChar}${config.command.trim()}`,
        nick: member.nick,
        address: member.host,
        target: context.channelName
      },
      config,
      { kind: 'continuation', requestedBy: context.nick }
    );
  }

  /**
   * Work out the sender's own address: decoded webchat ident, then a
   * literal address host, then ask the server with STATS L.
   */
  private async lookupOwnAddress(
    context: CommandContext,
    request: LookupRequest,
    config: IlineConfig
  ): Promise<DispatchResult> {
    const { user, host } = splitUserHost(context.address);
    const extended = config.showExtended ? ` (${context.nick}!${context.address})` : '';

    if (config.testWebchat && isWebGatewayHost(host) && isHexHost(user)) {
      const decoded = hexToIPv4(user);
      if (looksLikeAddress(decoded)) {
        const reply = await this.lookup(request, decoded, PrefixFlag.WEBCHAT, extended, config);
        return { status: 'looked-up', address: decoded, provenance: PrefixFlag.WEBCHAT, reply };
      }
    }

    if (looksLikeAddress(host)) {
      const address = host.toLowerCase();
      const reply = await this.lookup(request, address, PrefixFlag.PUBLIC, extended, config);
      return { status: 'looked-up', address, provenance: PrefixFlag.PUBLIC, reply };
    }

    this.coordinator.advance(request, 'awaiting-status-reply');
    this.correlator.begin(context.server, request, config, (expired) => {
      this.finish(expired, 'timeout');
    });

    return { status: 'awaiting-status-reply', nick: context.nick };
  }

  /**
   * Announce, fetch and deliver. The request is closed however the
   * fetch ends.
   */
  private async lookup(
    request: LookupRequest,
    address: string,
    provenance: PrefixFlag,
    extended: string,
    config: IlineConfig
  ): Promise<LookupReply | null> {
    if (!config.hideLooking) {
      this.sendTo(request, `Looking up ${address}${extended}`, provenance, config);
    }

    this.coordinator.advance(request, 'fetching');

    let reply: LookupReply | null;
    try {
      reply = await this.executor.execute(address, config);
    } catch (error) {
      this.formatter.displayError(`Lookup of ${address} failed: ${error instanceof Error ? error.message : String(error)}`);
      reply = null;
    }

    if (reply) {
      this.sendTo(request, reply.text, reply.bits, config);
      const outcome: LookupOutcome = reply.bits & PrefixFlag.ERROR ? 'no-reply' : 'reply';
      this.finish(request, outcome, { address, provenance, reply: reply.text });
    } else {
      this.finish(request, 'worker-failed', { address, provenance });
    }

    return reply;
  }

  private finish(
    request: LookupRequest,
    outcome: LookupOutcome,
    details: { address?: string; provenance?: PrefixFlag; reply?: string } = {}
  ): void {
    this.coordinator.close(request);

    if (!this.logger) {
      return;
    }

    const entry: LookupLogEntry = {
      timestamp: new Date().toISOString(),
      server: request.serverTag,
      channel: request.channelName,
      nick: request.nick,
      outcome
    };
    if (request.requestedBy !== undefined) {
      entry.requestedBy = request.requestedBy;
    }
    if (details.address !== undefined) {
      entry.address = details.address;
    }
    if (details.provenance !== undefined) {
      entry.provenance = this.formatter.describe(details.provenance).join(' ');
    }
    if (details.reply !== undefined) {
      entry.reply = details.reply;
    }

    this.logger.log(entry);
  }

  /**
   * " (nick!user@host)" for the requester as currently seen on the channel
   */
  private describeMember(request: LookupRequest, config: IlineConfig): string {
    if (!config.showExtended) {
      return '';
    }

    const member = this.findChannel(request)?.findMember(request.nick);
    return member ? ` (${member.nick}!${member.host})` : ` (${request.nick} not found)`;
  }

  private isMonitored(serverTag: string, channelName: string, config: IlineConfig): boolean {
    const key = `${serverTag}/${channelName}`.toLowerCase();
    return config.channels.some((entry) => entry.trim().toLowerCase() === key);
  }

  private findChannel(target: LookupTarget): ChatChannel | undefined {
    return this.directory.findServer(target.serverTag)?.findChannel(target.channelName);
  }

  /**
   * Send a line back to the channel a request came from. Nothing is sent
   * if we have since left the network or channel.
   */
  private sendTo(target: LookupTarget, body: string, bits: PrefixBits, config: IlineConfig): void {
    const channel = this.findChannel(target);
    if (channel) {
      channel.say(this.formatter.format(target.nick, body, bits, config));
    }
  }

  private reply(context: CommandContext, body: string, bits: PrefixBits, config: IlineConfig): void {
    context.channel.say(this.formatter.format(context.nick, body, bits, config));
  }
}

function drop(reason: DropReason): DispatchResult {
  return { status: 'dropped', reason };
}

function hasPrivileges(member: ChannelMember | undefined): boolean {
  return member !== undefined && (member.op || member.halfop || member.voice);
}

/**
 * "iline 192.0.2.1" -> command "iline", argument "192.0.2.1"
 */
function splitCommand(text: string): { command: string; argument: string } {
  const trimmed = text.trimStart();
  const space = trimmed.search(/\s/);

  if (space === -1) {
    return { command: trimmed.toLowerCase(), argument: '' };
  }

  return {
    command: trimmed.substring(0, space).toLowerCase(),
    argument: trimmed.substring(space + 1).trim()
  };
}

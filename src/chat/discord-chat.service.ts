import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChannelType,
  Client,
  DiscordAPIError,
  EmbedBuilder,
  GatewayIntentBits,
  RESTJSONErrorCodes,
  type GuildTextBasedChannel,
  type ThreadChannel,
} from 'discord.js';
import {
  ChatMessageNotFoundError,
  ExternalServiceError,
  errorMessage,
} from '../common/errors';
import type {
  ChatMessage,
  ChatSurface,
  EmbedView,
  PinnedMessage,
  StartedThread,
} from './chat-surface';

export function toEmbed(view: EmbedView): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle(view.title).setColor(view.color);
  if (view.description) embed.setDescription(view.description);
  if (view.fields.length > 0) embed.addFields(view.fields);
  if (view.footer) embed.setFooter({ text: view.footer });
  return embed;
}

function toPayload(message: ChatMessage) {
  return {
    ...(message.content !== undefined && { content: message.content }),
    ...(message.embed && { embeds: [toEmbed(message.embed)] }),
  };
}

/**
 * Discord gateway client and the ChatSurface the auction core talks to.
 * Logs in once the application has bootstrapped, so every listener
 * registered during module init sees the ready event.
 */
@Injectable()
export class DiscordChatService
  implements ChatSurface, OnApplicationBootstrap, OnModuleDestroy
{
  private readonly client: Client;
  private readonly logger = new Logger(DiscordChatService.name);
  private readonly token?: string;

  constructor(config: ConfigService) {
    this.token = config.get<string>('discord.token');
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
    });
    this.client.on('error', (err) =>
      this.logger.error('Discord client error', err.stack),
    );
  }

  getClient(): Client {
    return this.client;
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.token) {
      this.logger.warn('DISCORD_TOKEN is not set; chat surface stays offline');
      return;
    }
    await this.client.login(this.token);
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.destroy();
  }

  isReady(): boolean {
    return this.client.isReady();
  }

  async sendMessage(channelId: string, message: ChatMessage): Promise<string> {
    return this.call(`send to ${channelId}`, async () => {
      const channel = await this.textChannel(channelId);
      const sent = await channel.send(toPayload(message));
      return sent.id;
    });
  }

  async startThread(
    channelId: string,
    message: ChatMessage,
    name: string,
  ): Promise<StartedThread> {
    return this.call(`start thread in ${channelId}`, async () => {
      const channel = await this.textChannel(channelId);
      if (
        channel.type !== ChannelType.GuildText &&
        channel.type !== ChannelType.GuildAnnouncement
      ) {
        throw new ExternalServiceError(
          'chat',
          `Channel ${channelId} cannot host threads`,
        );
      }
      const starter = await channel.send(toPayload(message));
      const thread = await starter.startThread({ name });
      return { threadId: thread.id, starterMessageId: starter.id };
    });
  }

  async editMessage(
    channelId: string,
    messageId: string,
    message: ChatMessage,
  ): Promise<void> {
    await this.call(`edit ${messageId}`, async () => {
      const channel = await this.textChannel(channelId);
      try {
        const existing = await channel.messages.fetch(messageId);
        await existing.edit(toPayload(message));
      } catch (err) {
        if (
          err instanceof DiscordAPIError &&
          err.code === RESTJSONErrorCodes.UnknownMessage
        ) {
          throw new ChatMessageNotFoundError(channelId, messageId, {
            cause: err,
          });
        }
        throw err;
      }
    });
  }

  async closeThread(threadId: string): Promise<void> {
    await this.call(`close thread ${threadId}`, async () => {
      const thread = await this.thread(threadId);
      await thread.edit({ archived: true, locked: true });
    });
  }

  async addThreadMember(threadId: string, userId: string): Promise<void> {
    await this.call(`add ${userId} to ${threadId}`, async () => {
      const thread = await this.thread(threadId);
      await thread.members.add(userId);
    });
  }

  async listPinnedMessages(channelId: string): Promise<PinnedMessage[]> {
    return this.call(`list pins in ${channelId}`, async () => {
      const channel = await this.textChannel(channelId);
      const pins = await channel.messages.fetchPinned();
      const selfId = this.client.user?.id;
      return pins.map((message) => ({
        id: message.id,
        authoredBySelf: message.author.id === selfId,
        embedTitle: message.embeds[0]?.title ?? null,
      }));
    });
  }

  async pinMessage(channelId: string, messageId: string): Promise<void> {
    await this.call(`pin ${messageId}`, async () => {
      const channel = await this.textChannel(channelId);
      const message = await channel.messages.fetch(messageId);
      await message.pin();
    });
  }

  async findLatestOwnEmbedMessage(
    threadId: string,
    limit: number,
  ): Promise<string | null> {
    return this.call(`scan ${threadId}`, async () => {
      const thread = await this.thread(threadId);
      const selfId = this.client.user?.id;
      const recent = await thread.messages.fetch({ limit });
      const own = recent.find(
        (message) => message.author.id === selfId && message.embeds.length > 0,
      );
      return own?.id ?? null;
    });
  }

  private async textChannel(channelId: string): Promise<GuildTextBasedChannel> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      throw new ExternalServiceError(
        'chat',
        `Channel ${channelId} is not a guild text channel`,
      );
    }
    return channel;
  }

  private async thread(threadId: string): Promise<ThreadChannel> {
    const channel = await this.client.channels.fetch(threadId);
    if (!channel || !channel.isThread()) {
      throw new ExternalServiceError('chat', `Channel ${threadId} is not a thread`);
    }
    return channel;
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      throw new ExternalServiceError(
        'chat',
        `Discord ${label} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}

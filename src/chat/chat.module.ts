import { Module } from '@nestjs/common';
import { CHAT_SURFACE } from './chat-surface';
import { DiscordChatService } from './discord-chat.service';

@Module({
  providers: [
    DiscordChatService,
    { provide: CHAT_SURFACE, useExisting: DiscordChatService },
  ],
  exports: [DiscordChatService, CHAT_SURFACE],
})
export class ChatModule {}

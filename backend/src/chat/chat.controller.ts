import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import { ChatReplyPayload } from '@cottage-concierge/shared-types';
import { Response } from 'express';

import { DatabaseService } from '../database/database.service';
import { CompletionClient } from '../llm/completion-client';
import { SessionRegistry } from '../sessions/session-registry.service';
import { ChatOrchestrator, ChatStreamEvent } from './chat-orchestrator.service';
import { ChatRequestDto } from './dto/chat-request.dto';
import { SessionRequestDto } from './dto/session-request.dto';

const SESSION_ID = /^[\w-]{1,64}$/;

export interface HealthStatus {
  status: 'ok';
  sessions: number;
  completion: string;
  retrieval: 'database' | 'not_configured';
}

@Controller()
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private readonly orchestrator: ChatOrchestrator,
    private readonly sessions: SessionRegistry,
    private readonly completion: CompletionClient,
    private readonly databaseService: DatabaseService,
  ) {}

  @Post('chat')
  @HttpCode(200)
  chat(@Body() body: ChatRequestDto): Promise<ChatReplyPayload> {
    return this.orchestrator.reply(body.sessionId, body.message.trim());
  }

  /** Server-sent events: `chunk` events with answer text, then one `done` event with the full reply. */
  @Post('chat/stream')
  async stream(@Body() body: ChatRequestDto, @Res() res: Response): Promise<void> {
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = (event: ChatStreamEvent) => {
      const data = event.type === 'chunk' ? { text: event.text } : event.reply;
      res.write(`event: ${event.type}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    try {
      await this.orchestrator.streamReply(body.sessionId, body.message.trim(), send);
    } catch (error) {
      this.logger.error(
        `Streaming turn failed for session ${body.sessionId}`,
        error instanceof Error ? error.stack : String(error),
      );
      res.write(`event: error\ndata: ${JSON.stringify({ message: 'The answer could not be completed.' })}\n\n`);
    } finally {
      res.end();
    }
  }

  @Post('chat/clear')
  @HttpCode(200)
  async clear(@Body() body: SessionRequestDto): Promise<{ sessionId: string; cleared: boolean }> {
    return { sessionId: body.sessionId, cleared: await this.sessions.clear(body.sessionId) };
  }

  @Delete('chat/sessions/:id')
  async remove(@Param('id') id: string): Promise<{ sessionId: string; deleted: true }> {
    if (!SESSION_ID.test(id)) {
      throw new BadRequestException('Invalid session id');
    }
    if (!(await this.sessions.delete(id))) {
      throw new NotFoundException(`Session ${id} not found`);
    }
    return { sessionId: id, deleted: true };
  }

  @Get('health')
  health(): HealthStatus {
    return {
      status: 'ok',
      sessions: this.sessions.size,
      completion: this.completion.name,
      retrieval: this.databaseService.isConfigured ? 'database' : 'not_configured',
    };
  }
}

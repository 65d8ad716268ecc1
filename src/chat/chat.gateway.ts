import { Logger, OnModuleDestroy } from '@nestjs/common';
import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  MessageBody,
  ConnectedSocket,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { ChatService } from './chat.service';
import { ExerciseService } from '../exercise/exercise.service';
import { ExerciseView, TransitionResult, describeExercise } from '../exercise/exercise-state-machine';
import { isExerciseKind } from '../exercise/exercise-steps';
import { normalizeSessionId } from '../common/session-id';

export const sessionRoom = (sessionId: string): string => `session-${sessionId}`;

function readSessionId(client: Socket): string | null {
  const sessionId: unknown = client.data.sessionId;
  return typeof sessionId === 'string' ? sessionId : null;
}

@WebSocketGateway({
  cors: {
    origin: '*',
  },
})
export class ChatGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect, OnModuleDestroy {
  private readonly logger = new Logger(ChatGateway.name);
  private unsubscribe: (() => void) | null = null;

  @WebSocketServer()
  server!: Server;

  constructor(
    private chatService: ChatService,
    private exerciseService: ExerciseService,
  ) {}

  afterInit() {
    // Timed exercise steps advance without a client request, so push them
    this.unsubscribe = this.exerciseService.subscribe((sessionId, view) => {
      this.server.to(sessionRoom(sessionId)).emit('exerciseStep', view);
    });
  }

  handleConnection(client: Socket) {
    const sessionId = normalizeSessionId(client.handshake.auth?.sessionId);
    if (sessionId === null) {
      this.logger.warn(`Client ${client.id} connected without a valid session id`);
      client.disconnect();
      return;
    }

    client.data.sessionId = sessionId;
    void client.join(sessionRoom(sessionId));
    this.logger.log(`Client ${client.id} connected`);
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client ${client.id} disconnected`);
  }

  onModuleDestroy() {
    this.unsubscribe?.();
  }

  @SubscribeMessage('sendMessage')
  async handleMessage(@ConnectedSocket() client: Socket, @MessageBody() payload: { message?: unknown }) {
    const sessionId = readSessionId(client);
    if (!sessionId) {
      return;
    }
    if (typeof payload?.message !== 'string') {
      client.emit('error', { message: 'message must be a string' });
      return;
    }

    client.emit('typing', { isTyping: true });
    try {
      const response = await this.chatService.sendMessage(sessionId, payload.message);
      client.emit('newMessage', response);
    } catch (error) {
      this.logger.warn(`sendMessage failed for ${sessionId}: ${error instanceof Error ? error.message : String(error)}`);
      client.emit('error', { message: error instanceof Error ? error.message : 'Unable to process message' });
    } finally {
      client.emit('typing', { isTyping: false });
    }
  }

  @SubscribeMessage('enterExercise')
  handleEnterExercise(@ConnectedSocket() client: Socket, @MessageBody() payload: { kind?: unknown }) {
    const sessionId = readSessionId(client);
    if (!sessionId) {
      return;
    }
    if (!isExerciseKind(payload?.kind)) {
      client.emit('error', { message: 'kind must be "grounding" or "panic"' });
      return;
    }
    return this.reportTransition(client, this.exerciseService.enter(sessionId, payload.kind));
  }

  @SubscribeMessage('advanceExercise')
  handleAdvanceExercise(@ConnectedSocket() client: Socket) {
    const sessionId = readSessionId(client);
    if (!sessionId) {
      return;
    }
    return this.reportTransition(client, this.exerciseService.advance(sessionId));
  }

  @SubscribeMessage('finishExercise')
  async handleFinishExercise(@ConnectedSocket() client: Socket) {
    const sessionId = readSessionId(client);
    if (!sessionId) {
      return;
    }
    return this.reportTransition(client, await this.exerciseService.finish(sessionId));
  }

  @SubscribeMessage('abortExercise')
  handleAbortExercise(@ConnectedSocket() client: Socket) {
    const sessionId = readSessionId(client);
    if (!sessionId) {
      return;
    }
    return this.exerciseService.abort(sessionId);
  }

  private reportTransition(client: Socket, result: TransitionResult): ExerciseView {
    if (!result.ok) {
      client.emit('error', { message: `Exercise transition rejected: ${result.reason}` });
    }
    return describeExercise(result.state);
  }
}

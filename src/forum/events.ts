import { createModuleLogger, errorMessage } from '../utils/logger.js';
import type { QuestionStatus } from '../memory/database.js';

const logger = createModuleLogger('events');

export interface AnswerPayload {
  id: string;
  questionId: string;
  message: string;
  userId: string;
  timestamp: string;
}

/**
 * Notifications pushed to real-time listeners. Published only after the
 * corresponding write has committed.
 */
export type ForumEvent =
  | {
      type: 'question_created';
      data: {
        id: string;
        message: string;
        timestamp: string;
        status: QuestionStatus;
        userId: string;
        answers: AnswerPayload[];
      };
    }
  | { type: 'answer_created'; data: { questionId: string; answer: AnswerPayload } }
  | { type: 'question_answered'; data: { questionId: string } };

export type ForumEventHandler = (event: ForumEvent) => void;

/**
 * In-process fan-out to subscribers (the WebSocket layer subscribes here).
 * A failing subscriber is logged and does not stop delivery to the others.
 */
export class ForumEventBus {
  private readonly listeners = new Set<ForumEventHandler>();

  publish(event: ForumEvent): void {
    this.listeners.forEach((handler) => {
      try {
        handler(event);
      } catch (error) {
        logger.error(`Listener failed for ${event.type}: ${errorMessage(error)}`);
      }
    });
  }

  subscribe(handler: ForumEventHandler): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

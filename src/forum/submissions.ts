/**
 * Submission flow
 *
 * Glue between the forum records and the advisory subsystems.
 *
 * QUESTION:
 *   moderation ─┐
 *               ├─ both settle → ban? reject : write → publish
 *   suggestion ─┘
 *
 * ANSWER:
 *   moderation → ban? reject : write → publish → add pair to knowledge base
 *   (not for flagged answers or answers to Escalated questions)
 *
 * Moderation and suggestions never fail a submission; only the primary
 * write can. Flagged questions are stored as Escalated. Retrying a
 * submission key that was already rejected returns the recorded rejection.
 */

import { randomUUID } from 'crypto';
import {
  createAnswer,
  createQuestion,
  getQuestionById,
  getUserById,
  markQuestionAnswered,
  type Answer,
  type ForumDatabase,
  type Question,
} from '../memory/database.js';
import type { ModerationClassifier, ModerationVerdict } from '../moderation/classifier.js';
import { enforceVerdict, findEnforcement, type EnforcementRecord } from '../moderation/enforcement.js';
import type { AnswerSynthesizer, RAGSuggestion } from '../rag/synthesizer.js';
import type { KnowledgeIndexer } from '../rag/indexer.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { createModuleLogger } from '../utils/logger.js';
import type { ForumEventBus } from './events.js';

const logger = createModuleLogger('submissions');

export const MAX_MESSAGE_LENGTH = 5000;

const UNMODERATED: ModerationVerdict = { label: 'SAFE', action: 'allow', reason: 'moderation disabled' };

export interface ForumServiceOptions {
  db: ForumDatabase;
  events: ForumEventBus;
  /** null disables moderation */
  classifier: ModerationClassifier | null;
  /** null disables answer suggestions */
  synthesizer: AnswerSynthesizer | null;
  /** null disables knowledge ingestion of new answers */
  indexer: KnowledgeIndexer | null;
}

export interface QuestionSubmission {
  userId: string;
  message: string;
  /** Stable key of this submission; retries must reuse it. */
  submissionKey?: string;
}

export interface AnswerSubmission extends QuestionSubmission {
  questionId: string;
}

export type SubmissionRejected = {
  status: 'rejected';
  verdict: ModerationVerdict;
  enforcement: EnforcementRecord;
};

export type QuestionSubmissionResult =
  | { status: 'created'; question: Question; verdict: ModerationVerdict; suggestion: RAGSuggestion | null }
  | SubmissionRejected;

export type AnswerSubmissionResult =
  | { status: 'created'; answer: Answer; verdict: ModerationVerdict; knowledgeEntryId: string | null }
  | SubmissionRejected;

function validateMessage(message: string): string {
  const trimmed = message.trim();
  if (trimmed.length === 0 || message.length > MAX_MESSAGE_LENGTH) {
    throw new InvalidArgumentError(`message must be between 1 and ${MAX_MESSAGE_LENGTH} characters`);
  }
  return trimmed;
}

export class ForumService {
  private readonly db: ForumDatabase;
  private readonly events: ForumEventBus;
  private readonly classifier: ModerationClassifier | null;
  private readonly synthesizer: AnswerSynthesizer | null;
  private readonly indexer: KnowledgeIndexer | null;

  constructor(options: ForumServiceOptions) {
    this.db = options.db;
    this.events = options.events;
    this.classifier = options.classifier;
    this.synthesizer = options.synthesizer;
    this.indexer = options.indexer;
  }

  private async moderate(text: string): Promise<ModerationVerdict> {
    return this.classifier ? this.classifier.classify(text) : UNMODERATED;
  }

  private requireUser(userId: string): void {
    const user = getUserById(this.db, userId);
    if (!user) {
      throw new InvalidArgumentError(`Unknown user: ${userId}`);
    }
    if (!user.isActive) {
      throw new InvalidArgumentError(`User is deactivated: ${userId}`);
    }
  }

  /**
   * A retried submission that was already rejected gets the recorded
   * outcome back, even though its author is gone by now.
   */
  private previousRejection(submissionKey: string | undefined): SubmissionRejected | null {
    if (!submissionKey) return null;
    const recorded = findEnforcement(this.db, submissionKey);
    if (!recorded) return null;

    logger.info(`Submission ${submissionKey} already rejected`, { outcome: recorded.enforcement.outcome });
    return { status: 'rejected', ...recorded };
  }

  private reject(submissionKey: string, userId: string, verdict: ModerationVerdict): SubmissionRejected {
    const enforcement = enforceVerdict(this.db, { submissionKey, userId, verdict });
    logger.warn(`Submission ${submissionKey} rejected: ${verdict.label}`, {
      userId,
      outcome: enforcement.outcome,
    });
    return { status: 'rejected', verdict, enforcement };
  }

  async submitQuestion(submission: QuestionSubmission): Promise<QuestionSubmissionResult> {
    const message = validateMessage(submission.message);
    const previous = this.previousRejection(submission.submissionKey);
    if (previous) return previous;

    const submissionKey = submission.submissionKey ?? randomUUID();
    this.requireUser(submission.userId);

    const [verdict, suggestion] = await Promise.all([
      this.moderate(message),
      this.synthesizer ? this.synthesizer.generateAnswer(message) : Promise.resolve(null),
    ]);

    if (verdict.action === 'ban') {
      return this.reject(submissionKey, submission.userId, verdict);
    }

    const question = createQuestion(this.db, {
      message,
      userId: submission.userId,
      status: verdict.action === 'flag' ? 'Escalated' : 'Pending',
    });
    logger.info(`Question created successfully: ${question.id}`, { action: verdict.action });

    this.events.publish({
      type: 'question_created',
      data: {
        id: question.id,
        message: question.message,
        timestamp: question.createdAt,
        status: question.status,
        userId: question.userId,
        answers: [],
      },
    });

    return { status: 'created', question, verdict, suggestion };
  }

  async submitAnswer(submission: AnswerSubmission): Promise<AnswerSubmissionResult> {
    const message = validateMessage(submission.message);
    const previous = this.previousRejection(submission.submissionKey);
    if (previous) return previous;

    const submissionKey = submission.submissionKey ?? randomUUID();
    this.requireUser(submission.userId);

    const question = getQuestionById(this.db, submission.questionId);
    if (!question) {
      throw new InvalidArgumentError(`Question not found: ${submission.questionId}`);
    }

    const verdict = await this.moderate(message);
    if (verdict.action === 'ban') {
      return this.reject(submissionKey, submission.userId, verdict);
    }

    const answer = createAnswer(this.db, {
      questionId: question.id,
      message,
      userId: submission.userId,
    });
    logger.info(`Answer created successfully: ${answer.id}`, { questionId: question.id });

    this.events.publish({
      type: 'answer_created',
      data: {
        questionId: question.id,
        answer: {
          id: answer.id,
          questionId: answer.questionId,
          message: answer.message,
          userId: answer.userId,
          timestamp: answer.createdAt,
        },
      },
    });

    // Only accepted pairs become suggestion context
    const accepted = verdict.action !== 'flag' && question.status !== 'Escalated';
    if (!accepted) {
      logger.debug(`Answer ${answer.id} not added to knowledge base`, {
        action: verdict.action,
        questionStatus: question.status,
      });
    }

    const knowledgeEntryId = this.indexer && accepted
      ? await this.indexer.addToKnowledgeBase(question.message, answer.message, {
          id: question.id,
          metadata: {
            answer_id: answer.id,
            user_id: question.userId,
            question_created_at: question.createdAt,
            answer_created_at: answer.createdAt,
          },
        })
      : null;

    return { status: 'created', answer, verdict, knowledgeEntryId };
  }

  /**
   * @returns the updated question, or null when it does not exist
   */
  markAnswered(questionId: string): Question | null {
    const question = markQuestionAnswered(this.db, questionId);
    if (question) {
      this.events.publish({ type: 'question_answered', data: { questionId } });
    }
    return question;
  }
}

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('database');

/**
 * Handle to the relational store. Forum records (users, questions,
 * answers) and the knowledge collection live in the same SQLite file.
 */
export type ForumDatabase = Database.Database;

/**
 * Open (or create) the database file and apply connection pragmas.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): ForumDatabase {
  if (path !== ':memory:') {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Create the forum tables. Safe to call multiple times.
 */
export function initSchema(db: ForumDatabase): void {
  logger.info('Initializing database schema...');

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL UNIQUE,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'guest' CHECK (role IN ('guest', 'admin')),
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS questions (
      id TEXT PRIMARY KEY,
      message TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'Pending' CHECK (status IN ('Pending', 'Escalated', 'Answered')),
      user_id TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS answers (
      id TEXT PRIMARY KEY,
      question_id TEXT NOT NULL,
      message TEXT NOT NULL,
      user_id TEXT NOT NULL,
      created_at TEXT NOT NULL,
      FOREIGN KEY (question_id) REFERENCES questions(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )
  `);

  // One row per moderated submission that led to enforcement
  db.exec(`
    CREATE TABLE IF NOT EXISTS moderation_actions (
      submission_key TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      label TEXT NOT NULL,
      action TEXT NOT NULL,
      reason TEXT NOT NULL,
      outcome TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_questions_status ON questions(status);
    CREATE INDEX IF NOT EXISTS idx_questions_user ON questions(user_id);
    CREATE INDEX IF NOT EXISTS idx_answers_question ON answers(question_id);
    CREATE INDEX IF NOT EXISTS idx_moderation_actions_user ON moderation_actions(user_id);
  `);

  logger.info('Database schema initialized');
}

// ============================================
// Users
// ============================================

export type UserRole = 'guest' | 'admin';

export interface User {
  id: string;
  username: string;
  email: string;
  role: UserRole;
  isActive: boolean;
  createdAt: string;
}

interface UserRow {
  id: string;
  username: string;
  email: string;
  role: UserRole;
  is_active: number;
  created_at: string;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  };
}

export function createUser(
  db: ForumDatabase,
  input: { username: string; email: string; passwordHash: string; role?: UserRole; id?: string }
): User {
  const id = input.id ?? randomUUID();
  const now = new Date().toISOString();
  const role = input.role ?? 'guest';

  db.prepare(`
    INSERT INTO users (id, username, email, password_hash, role, is_active, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, 1, ?, ?)
  `).run(id, input.username, input.email, input.passwordHash, role, now, now);

  return { id, username: input.username, email: input.email, role, isActive: true, createdAt: now };
}

export function getUserById(db: ForumDatabase, userId: string): User | null {
  const row = db.prepare(`
    SELECT id, username, email, role, is_active, created_at FROM users WHERE id = ?
  `).get(userId) as UserRow | undefined;

  return row ? toUser(row) : null;
}

export function deleteUserRow(db: ForumDatabase, userId: string): number {
  return db.prepare(`DELETE FROM users WHERE id = ?`).run(userId).changes;
}

/**
 * Mark a user inactive without removing their records.
 */
export function deactivateUser(db: ForumDatabase, userId: string): boolean {
  const result = db.prepare(`
    UPDATE users SET is_active = 0, updated_at = ? WHERE id = ?
  `).run(new Date().toISOString(), userId);

  return result.changes > 0;
}

// ============================================
// Questions & Answers
// ============================================

export type QuestionStatus = 'Pending' | 'Escalated' | 'Answered';

export interface Question {
  id: string;
  message: string;
  status: QuestionStatus;
  userId: string;
  createdAt: string;
}

export interface Answer {
  id: string;
  questionId: string;
  message: string;
  userId: string;
  createdAt: string;
}

export interface QuestionWithAnswers extends Question {
  answers: Answer[];
}

interface QuestionRow {
  id: string;
  message: string;
  status: QuestionStatus;
  user_id: string;
  created_at: string;
}

interface AnswerRow {
  id: string;
  question_id: string;
  message: string;
  user_id: string;
  created_at: string;
}

function toQuestion(row: QuestionRow): Question {
  return {
    id: row.id,
    message: row.message,
    status: row.status,
    userId: row.user_id,
    createdAt: row.created_at,
  };
}

function toAnswer(row: AnswerRow): Answer {
  return {
    id: row.id,
    questionId: row.question_id,
    message: row.message,
    userId: row.user_id,
    createdAt: row.created_at,
  };
}

export function createQuestion(
  db: ForumDatabase,
  input: { message: string; userId: string; status?: QuestionStatus; createdAt?: string }
): Question {
  const id = randomUUID();
  const createdAt = input.createdAt ?? new Date().toISOString();
  const status = input.status ?? 'Pending';

  db.prepare(`
    INSERT INTO questions (id, message, status, user_id, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(id, input.message, status, input.userId, createdAt, createdAt);

  return { id, message: input.message, status, userId: input.userId, createdAt };
}

export function getQuestionById(db: ForumDatabase, questionId: string): Question | null {
  const row = db.prepare(`
    SELECT id, message, status, user_id, created_at FROM questions WHERE id = ?
  `).get(questionId) as QuestionRow | undefined;

  return row ? toQuestion(row) : null;
}

export function createAnswer(
  db: ForumDatabase,
  input: { questionId: string; message: string; userId: string; createdAt?: string }
): Answer {
  const id = randomUUID();
  const createdAt = input.createdAt ?? new Date().toISOString();

  db.prepare(`
    INSERT INTO answers (id, question_id, message, user_id, created_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(id, input.questionId, input.message, input.userId, createdAt);

  return { id, questionId: input.questionId, message: input.message, userId: input.userId, createdAt };
}

export function markQuestionAnswered(db: ForumDatabase, questionId: string): Question | null {
  const result = db.prepare(`
    UPDATE questions SET status = 'Answered', updated_at = ? WHERE id = ?
  `).run(new Date().toISOString(), questionId);

  if (result.changes === 0) return null;
  return getQuestionById(db, questionId);
}

/**
 * Questions in the given status that have at least one answer,
 * each with all of its answers attached.
 */
export function getQuestionsWithAnswers(
  db: ForumDatabase,
  status: QuestionStatus = 'Answered'
): QuestionWithAnswers[] {
  const questions = db.prepare(`
    SELECT q.id, q.message, q.status, q.user_id, q.created_at
    FROM questions q
    WHERE q.status = ?
      AND EXISTS (SELECT 1 FROM answers a WHERE a.question_id = q.id)
    ORDER BY q.created_at ASC
  `).all(status) as QuestionRow[];

  const answersFor = db.prepare(`
    SELECT id, question_id, message, user_id, created_at
    FROM answers
    WHERE question_id = ?
  `);

  return questions.map((row) => ({
    ...toQuestion(row),
    answers: (answersFor.all(row.id) as AnswerRow[]).map(toAnswer),
  }));
}

/**
 * Close the database connection.
 * Should be called during graceful shutdown.
 */
export function closeDatabase(db: ForumDatabase): void {
  if (db.open) {
    db.close();
  }
}

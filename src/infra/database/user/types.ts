import type { ColumnType, Generated, JSONColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Learner States Table
// One JSONB state document per learner. `version` is the optimistic
// concurrency token, bumped on every write.
export interface LearnerStates {
  user_id: string;
  state: JSONColumnType<object | null>;
  version: number;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

// Submissions Table (owned by the submissions service; read-only here)
export interface Submissions {
  id: string;
  user_id: string;
  question_id: string;
  // Empty when the question's topics were not known at submission time
  topics: Generated<string[]>;
  success: boolean;
  error_pattern: string | null;
  quality: number | null;
  created_at: Timestamp;
}

// Questions Table (owned by the content service; read-only here)
export interface Questions {
  id: string;
  topics: string[];
}

export interface LearnerDatabase {
  learner_states: LearnerStates;
  submissions: Submissions;
  questions: Questions;
}

export type Subject = 'Mathematics' | 'Science' | 'Social Studies';
export type Difficulty = 'Beginner' | 'Intermediate' | 'Advanced';

export interface QuizItem {
  question: string;
  options: string[];
  correctAnswer: string;
  explanation: string;
}

export interface QuizParseResult {
  questions: QuizItem[];
  error?: string;
}

export interface GradedAnswer {
  index: number;
  question: string;
  yourAnswer: string;
  correctAnswer: string;
  explanation: string;
  isCorrect: boolean;
}

export interface QuizGrade {
  results: GradedAnswer[];
  score: number;
  total: number;
}

export interface ClientConfig {
  projectId: string;
  locationId: string;
  modelId: string;
  imageAnalysisEnabled: boolean;
  subjects: Record<Subject, string[]>;
  difficulties: Difficulty[];
}

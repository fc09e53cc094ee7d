export { TaskGenerator, type GenerationRequest, type GeneratorOptions } from './base.js';
export { LongFormAnswerGenerator } from './long-form-answer.js';
export { StudyPlanGenerator, normalizeExamDate, FALLBACK_STUDY_DAYS } from './study-plan.js';
export { QuizGenerator } from './quiz.js';
export { FlashcardsGenerator } from './flashcards.js';
export { ExplainConceptGenerator } from './explain-concept.js';
export { ImportantQuestionsGenerator } from './important-questions.js';
export type * from './types.js';

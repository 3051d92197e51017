/**
 * Flashcard types
 */

import { z } from 'zod';

export const FlashcardSchema = z.object({
  question: z.string(),
  answer: z.string(),
});

export const FlashcardListSchema = z.array(FlashcardSchema);

export type Flashcard = z.infer<typeof FlashcardSchema>;

/** A flashcard-set document decoded for display */
export interface StoredFlashcardSet {
  documentId: string;
  topic: string;
  creationDate: string;
  source: string;
  flashcards: Flashcard[];
}

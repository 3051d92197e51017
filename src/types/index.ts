export * from './document';
export * from './flashcard';

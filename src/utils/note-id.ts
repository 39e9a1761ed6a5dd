import { randomInt } from 'node:crypto';

// Uppercase without I, O, 0 and 1 so ids survive being read aloud or retyped
const ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
const GENERATED_LENGTH = 5;

const NOTE_ID_PATTERN = /^[A-Za-z0-9]+$/;

/**
 * Note ids double as file names and object keys, so anything outside
 * [A-Za-z0-9] (slashes, dots, whitespace) is rejected.
 */
export function isValidNoteId(noteId: string): boolean {
  return NOTE_ID_PATTERN.test(noteId);
}

/**
 * Random 5-character id. Not checked against storage; a collision overwrites.
 */
export function generateNoteId(): string {
  let id = '';
  for (let i = 0; i < GENERATED_LENGTH; i++) {
    id += ALPHABET[randomInt(ALPHABET.length)];
  }
  return id;
}

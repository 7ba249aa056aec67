// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • code.ts            → codes (4 unique digits), universe, parsing, secrets
//   • scoring.ts         → bulls & cows feedback oracle (evaluate)
//   • candidateEngine.ts → entropy-guided candidate reduction (CandidateEngine)
//   • session.ts         → game sessions (GameSession, SolverSession)
//   • errors.ts          → error kinds (InvalidNumber, EmptyCandidateSet, …)
//
// Example usage:
//   import { CandidateEngine, evaluate, parseCode } from '@bulls-cows/game-core';

export * from './code.js';
export * from './scoring.js';
export * from './candidateEngine.js';
export * from './session.js';
export * from './errors.js';

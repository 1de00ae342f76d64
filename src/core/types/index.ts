// CHANGE: Central export file for core type definitions
// WHY: Single import point for types used across layers

export type { GameOptions } from "./config.js";
export type {
	AwaitingGuess,
	Finished,
	GameEvent,
	GameEventTag,
	SessionState,
	StepResult,
} from "./session.js";

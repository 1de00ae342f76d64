export { compareGuess } from "./compare.js";
export { InvalidGuess, type InvalidGuessReason, parseGuess } from "./parse.js";

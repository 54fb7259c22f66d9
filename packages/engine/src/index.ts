export * from "./errors.js";
export * from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { SeededRandom, randomSeed, seedFromString, parseSeed, formatSeed } from "./random.js";
export { SHAPE_ORDER, getShape, shapeCells, cellCount, type ShapeDefinition } from "./pieces.js";
export { generatePieces, piecesEqual, pieceEquals, PIECES_PER_TURN } from "./piece-generator.js";
export * from "./board.js";
export * from "./players.js";
export * from "./scoring.js";
export * from "./match-state.js";
export * from "./codec.js";
export * from "./turn-machine.js";
export * from "./sync.js";
export * from "./transport.js";
export { RelayTransport, type RelayTransportOptions } from "./relay-transport.js";
export * from "./coordinator.js";

export const DEFAULT_ROUNDS = 200;
export const DEFAULT_NOISE = 0;
export const DEFAULT_SEED = 42;

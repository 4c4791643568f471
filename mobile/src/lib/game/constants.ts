/**
 * Relative letter weights used when rolling a fresh board.
 * Q always comes with its U.
 */
export const LETTER_WEIGHTS: Readonly<Record<string, number>> = {
  A: 8,
  B: 2,
  C: 3,
  D: 4,
  E: 11,
  F: 2,
  G: 3,
  H: 3,
  I: 7,
  J: 1,
  K: 1,
  L: 5,
  M: 3,
  N: 6,
  O: 7,
  P: 3,
  QU: 1,
  R: 7,
  S: 6,
  T: 7,
  U: 3,
  V: 1,
  W: 2,
  X: 1,
  Y: 2,
  Z: 1,
};

/** A passive turn update only raises a banner if the last turn is this recent */
export const TURN_NOTIFICATION_WINDOW_MS = 60 * 1000;

export const FULL_GAME_PRODUCT_ID = "app.lexicube.full_game";

/** Null index for links, list heads and the free list. */
export const NIL = -1;

export const DEFAULT_INITIAL_CAPACITY = 16;

/** Longest delay a Node timer accepts; larger ones are replaced by 1ms. */
export const TIMER_MAX_MS = 2_147_483_647;

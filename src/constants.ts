/** Null link in the node arena. */
export const NIL = -1;

/** Number of operation labels kept in the recorder's recent log. */
export const RECENT_LOG_LIMIT = 100;

/** Largest list capacity; node ids are stored in Int32Array links. */
export const MAX_CAPACITY = 0x7fffffff;

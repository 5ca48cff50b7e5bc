/** Interval handle used by the update triggers. */
export type Interval = ReturnType<typeof setInterval> | undefined;

/** Return type of collaborator methods: plain value for in-memory work, promise for I/O. */
export type MaybePromise<T> = T | Promise<T>;

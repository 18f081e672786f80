declare module 'json-truncate' {
  interface TruncateOptions {
    maxDepth?: number;
    replace?: unknown;
  }

  function truncate<T>(obj: T, options?: number | TruncateOptions): T;

  export default truncate;
}

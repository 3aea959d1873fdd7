// Lazy loading keeps `git-cc --version` and `--help` from loading the engine

export type LazyModule<T> = () => Promise<T>;

/**
 * Wraps a dynamic import so it runs at most once.
 */
export const createLazyModule = <T>(loader: () => Promise<T>): LazyModule<T> => {
  let pending: Promise<T> | undefined;
  return (): Promise<T> => {
    pending ??= loader();
    return pending;
  };
};

export const lazyModules = {
  gitCc: createLazyModule(() => import("../core/git-cc.js")),
  errorHandler: createLazyModule(() => import("./error-handler.js")),
  gradientString: createLazyModule(() => import("gradient-string")),
};

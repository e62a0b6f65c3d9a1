export type MemoryManager = {
  release: (value: unknown) => void;
};

export const noopMemoryManager: MemoryManager = {
  release: () => {},
};

/**
 * Temporaries created while converting the arguments of one call. The scope
 * belongs to that call alone and is disposed before the call returns or
 * throws.
 */
export type CallScope = {
  adopt: <T>(value: T) => T;
  readonly size: number;
  dispose: () => void;
};

export const createCallScope = (memory: MemoryManager): CallScope => {
  const temporaries: unknown[] = [];
  let disposed = false;

  return {
    adopt: <T>(value: T): T => {
      if (disposed) {
        throw new Error("cannot adopt a temporary into a disposed call scope");
      }
      temporaries.push(value);
      return value;
    },
    get size() {
      return temporaries.length;
    },
    dispose: () => {
      if (disposed) return;
      disposed = true;
      // Newest first.
      const pending = temporaries.splice(0).reverse();
      let failure: unknown;
      pending.forEach((value) => {
        try {
          memory.release(value);
        } catch (error) {
          failure ??= error;
        }
      });
      if (failure !== undefined) {
        throw new Error("failed to release call temporaries", {
          cause: failure,
        });
      }
    },
  };
};

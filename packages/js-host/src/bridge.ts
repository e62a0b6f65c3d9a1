import { decode, encode } from "@msgpack/msgpack";
import { isDispatchError, type OverloadedSet } from "@polycall/dispatch";

const MSGPACK_OPTS = { useBigInt64: true } as const;

export type CallOutcome =
  | { kind: "value"; value: unknown }
  | { kind: "failed"; code: string; message: string };

export type MsgPackBridge = {
  /** Decodes a msgpack argument array, calls `setName`, encodes the outcome. */
  call: (setName: string, payload: Uint8Array) => Uint8Array;
};

/**
 * Dispatch failures are reported in the encoded outcome. Anything else,
 * including exceptions raised by the native function, propagates.
 */
export const createMsgPackBridge = ({
  sets,
}: {
  sets: ReadonlyMap<string, OverloadedSet>;
}): MsgPackBridge => ({
  call: (setName, payload) => {
    const set = sets.get(setName);
    if (!set) {
      throw new Error(`unknown overloaded set ${setName}`);
    }
    const args = decode(payload, MSGPACK_OPTS);
    if (!Array.isArray(args)) {
      throw new Error(`expected a msgpack array of arguments for ${setName}`);
    }

    let outcome: CallOutcome;
    try {
      outcome = { kind: "value", value: set.call(args) };
    } catch (error) {
      if (!isDispatchError(error)) throw error;
      outcome = { kind: "failed", code: error.code, message: error.message };
    }
    return encode(outcome, MSGPACK_OPTS);
  },
});

export const encodeArguments = (args: readonly unknown[]): Uint8Array =>
  encode(args, MSGPACK_OPTS);

export const decodeOutcome = (payload: Uint8Array): CallOutcome => {
  const decoded = decode(payload, MSGPACK_OPTS);
  if (typeof decoded !== "object" || decoded === null) {
    throw new Error("malformed call outcome");
  }
  if ("kind" in decoded && decoded.kind === "value") {
    return { kind: "value", value: "value" in decoded ? decoded.value : null };
  }
  if (
    "kind" in decoded &&
    decoded.kind === "failed" &&
    "code" in decoded &&
    typeof decoded.code === "string" &&
    "message" in decoded &&
    typeof decoded.message === "string"
  ) {
    return { kind: "failed", code: decoded.code, message: decoded.message };
  }
  throw new Error("malformed call outcome");
};

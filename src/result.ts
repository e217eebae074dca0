export type Ok<T> = { t: "ok"; v: T };
export type Err<E> = { t: "err"; e: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = <E>(e: E): Err<E> => ({ t: "err", e });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.t === "ok";
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => r.t === "err";

/** Returns the value, or throws the error wrapped in an `Error`. */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (isOk(r)) return r.v;
  throw new Error(`unwrap on error result: ${JSON.stringify(r.e)}`);
};

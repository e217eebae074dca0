export interface NativeFunc {
  arity: number;
  fn: (...args: number[]) => number;
}

/** Host functions available to `bl run`, declared as externs when the driver is asked for natives. */
export const nativeFuncs: Record<string, NativeFunc> = {
  abs: {
    arity: 1,
    fn: (x) => Math.abs(x),
  },
  max: {
    arity: 2,
    fn: (a, b) => Math.max(a, b),
  },
  min: {
    arity: 2,
    fn: (a, b) => Math.min(a, b),
  },
  sqrt: {
    arity: 1,
    fn: (a) => Math.sqrt(a),
  },
};

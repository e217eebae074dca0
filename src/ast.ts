export type NodeType =
  | "Program"
  | "Number"
  | "Var"
  | "BinOp"
  | "Call"
  | "Extern";

export interface Node {
  type: NodeType;
}

export interface Program extends Node {
  type: "Program";
  body: TopLevel[];
}

export type Expression =
  | NumberLit
  | Var
  | BinOp
  | Call;

export type TopLevel = Expression | Extern;

export interface NumberLit extends Node {
  type: "Number";
  value: number;
}

export interface Var extends Node {
  type: "Var";
  name: string;
}

export interface BinOp extends Node {
  type: "BinOp";
  op: string; // "+" and "-" lower; anything the precedence table adds does not
  left: Expression;
  right: Expression;
}

export interface Call extends Node {
  type: "Call";
  callee: string;
  args: Expression[];
}

export interface Extern extends Node {
  type: "Extern";
  name: string;
  params: string[];
}

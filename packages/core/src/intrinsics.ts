/**
 * Built-in operations dispatched directly by the machine, keyed by their
 * source spelling.
 */
const SPELLINGS = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "rem",

  "=": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",

  or: "or",
  and: "and",
  not: "not",
  assert: "assert",

  drop: "drop",
  dupe: "dupe",
  swap: "swap",
  rot: "rot",

  len: "len",
  nth: "nth",
  split: "split",
  concat: "concat",
  push: "push",
  pop: "pop",
  insert: "insert",
  prop: "prop",
  has: "has",
  remove: "remove",
  keys: "keys",
  values: "values",

  cast: "cast",
  typeof: "typeOf",

  lazy: "lazy",
  if: "if",
  halt: "halt",
  call: "call",
  recur: "recur",
  orelse: "orElse",

  let: "let",
  def: "def",
  set: "set",
  get: "get",

  debug: "debug",
  print: "print",
  pretty: "pretty",
  import: "import",
} as const;

export type Intrinsic = (typeof SPELLINGS)[keyof typeof SPELLINGS];

const BY_SPELLING: ReadonlyMap<string, Intrinsic> = new Map(Object.entries(SPELLINGS));

const SPELLING_OF: ReadonlyMap<Intrinsic, string> = new Map(
  Object.entries(SPELLINGS).map(([spelling, name]): [Intrinsic, string] => [name, spelling])
);

export function intrinsicFromName(name: string): Intrinsic | undefined {
  return BY_SPELLING.get(name);
}

export function isIntrinsic(name: string): boolean {
  return BY_SPELLING.has(name);
}

export function intrinsicSpelling(intrinsic: Intrinsic): string {
  return SPELLING_OF.get(intrinsic) ?? intrinsic;
}

export const INTRINSIC_SPELLINGS: readonly string[] = Object.keys(SPELLINGS);

import {
  listOperationName,
  type ListOperationKind,
} from "@keel/lib/container-contract.js";
import {
  NULL,
  arrow,
  assignStmt,
  binary,
  call,
  comment,
  decrement,
  exprStmt,
  id,
  ifStmt,
  increment,
  int,
  named,
  pointer,
  returnStmt,
  variable,
  whileStmt,
  type CDecl,
  type CExpr,
  type CStmt,
  type CType,
} from "../c/syntax.js";

export type ChainRuntimeParams = {
  /** Definition name, e.g. `list_u8`. Every emitted symbol starts with it. */
  name: string;
  elementCType: CType;
  /** Source-level spelling of the list type, used in the leading comment. */
  label: string;
  accessCache: boolean;
};

const u64 = named("u64");
const voidType = named("void");
const self = id("this");
const field = (name: string): CExpr => arrow(self, name);
const str = (value: string): CExpr => ({ kind: "string", value });

/** Names of every function emitted for an instantiation, in emission order. */
export const chainRuntimeFunctionNames = (name: string) => {
  const op = (kind: ListOperationKind) => listOperationName(name, kind);
  return {
    elementNew: `${name}_element_new`,
    constructor: op("create"),
    destructor: `${name}_destructor`,
    cacheInvalidate: `${name}_cache_invalidate`,
    size: op("size"),
    add: op("append"),
    locate: `${name}_locate`,
    get: op("get"),
    set: op("set"),
    walk: `${name}_walk`,
    del: op("delete"),
    insert: op("insert"),
  };
};

/**
 * Emits the C definitions of one list instantiation: the node and container
 * structs plus every container operation, specialised to `elementCType`.
 * The output only refers to the element type, `u64`, `panic` and the C
 * allocator, so it compiles without any other instantiation.
 */
export const emitChainRuntime = ({
  name,
  elementCType,
  label,
  accessCache,
}: ChainRuntimeParams): CDecl[] => {
  const fn = chainRuntimeFunctionNames(name);
  const elementName = `${name}_element`;
  const elementPtr = pointer(named(elementName));
  const listPtr = pointer(named(name));
  const thisParam = { type: listPtr, name: "this" };
  const outOfBounds = (operation: string): CStmt =>
    exprStmt(call("panic", str(`index out of bounds in ${name}_${operation}`)));

  const elementStruct: CDecl = {
    kind: "struct",
    name: elementName,
    fields: [
      { type: elementCType, name: "value" },
      { type: elementPtr, name: "next" },
    ],
  };

  const listStruct: CDecl = {
    kind: "struct",
    name,
    fields: [
      { type: elementPtr, name: "head" },
      { type: elementPtr, name: "tail" },
      { type: named("bool"), name: "cache_valid" },
      { type: u64, name: "cache_index" },
      { type: elementPtr, name: "cache_element" },
      { type: u64, name: "size" },
    ],
  };

  const elementNew: CDecl = {
    kind: "function",
    returnType: elementPtr,
    name: fn.elementNew,
    params: [
      { type: elementCType, name: "value" },
      { type: elementPtr, name: "next" },
    ],
    body: [
      variable(elementPtr, "element", call("malloc", { kind: "sizeof", type: named(elementName) })),
      ifStmt(
        binary(id("element"), "==", NULL),
        exprStmt(call("panic", str(`out of memory in ${fn.elementNew}`)))
      ),
      assignStmt(arrow(id("element"), "value"), id("value")),
      assignStmt(arrow(id("element"), "next"), id("next")),
      returnStmt(id("element")),
    ],
  };

  const constructor: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.constructor,
    params: [thisParam],
    body: [
      assignStmt(field("head"), NULL),
      assignStmt(field("tail"), NULL),
      assignStmt(field("cache_valid"), id("false")),
      assignStmt(field("cache_index"), int(0)),
      assignStmt(field("cache_element"), NULL),
      assignStmt(field("size"), int(0)),
    ],
  };

  const destructor: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.destructor,
    params: [thisParam],
    body: [
      variable(elementPtr, "element", field("head")),
      whileStmt(
        binary(id("element"), "!=", NULL),
        variable(elementPtr, "next", arrow(id("element"), "next")),
        exprStmt(call("free", id("element"))),
        assignStmt(id("element"), id("next"))
      ),
      exprStmt(call(fn.constructor, self)),
    ],
  };

  const cacheInvalidate: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.cacheInvalidate,
    params: [thisParam],
    body: [assignStmt(field("cache_valid"), id("false"))],
  };

  const size: CDecl = {
    kind: "function",
    returnType: u64,
    name: fn.size,
    params: [thisParam],
    body: [returnStmt(field("size"))],
  };

  const add: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.add,
    params: [thisParam, { type: elementCType, name: "value" }],
    body: [
      exprStmt(call(fn.cacheInvalidate, self)),
      variable(elementPtr, "new_element", call(fn.elementNew, id("value"), NULL)),
      ifStmt(
        binary(field("head"), "==", NULL),
        assignStmt(field("head"), id("new_element")),
        assignStmt(field("tail"), id("new_element")),
        increment(field("size")),
        returnStmt()
      ),
      assignStmt(arrow(field("tail"), "next"), id("new_element")),
      assignStmt(field("tail"), id("new_element")),
      increment(field("size")),
    ],
  };

  const cacheLookup: CStmt[] = accessCache
    ? [
        comment("the chain only links forward, so only later indices can start from the cache"),
        ifStmt(
          binary(field("cache_valid"), "&&", binary(id("index"), ">=", field("cache_index"))),
          assignStmt(id("element"), field("cache_element")),
          assignStmt(id("remaining"), binary(id("index"), "-", field("cache_index")))
        ),
      ]
    : [];

  const cacheUpdate: CStmt[] = accessCache
    ? [
        assignStmt(field("cache_valid"), id("true")),
        assignStmt(field("cache_index"), id("index")),
        assignStmt(field("cache_element"), id("element")),
      ]
    : [];

  const locate: CDecl = {
    kind: "function",
    returnType: elementPtr,
    name: fn.locate,
    params: [
      thisParam,
      { type: u64, name: "index" },
      { type: pointer(named("const char")), name: "fault" },
    ],
    body: [
      variable(u64, "remaining", id("index")),
      variable(elementPtr, "element", field("head")),
      ...cacheLookup,
      whileStmt(
        binary(binary(id("element"), "!=", NULL), "&&", binary(id("remaining"), ">", int(0))),
        assignStmt(id("element"), arrow(id("element"), "next")),
        decrement(id("remaining"))
      ),
      ifStmt(
        binary(binary(id("remaining"), ">", int(0)), "||", binary(id("element"), "==", NULL)),
        exprStmt(call("panic", id("fault")))
      ),
      ...cacheUpdate,
      returnStmt(id("element")),
    ],
  };

  const get: CDecl = {
    kind: "function",
    returnType: elementCType,
    name: fn.get,
    params: [thisParam, { type: u64, name: "index" }],
    body: [
      variable(
        elementPtr,
        "element",
        call(fn.locate, self, id("index"), str(`index out of bounds in ${fn.get}`))
      ),
      returnStmt(arrow(id("element"), "value")),
    ],
  };

  const set: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.set,
    params: [thisParam, { type: u64, name: "index" }, { type: elementCType, name: "value" }],
    body: [
      variable(
        elementPtr,
        "element",
        call(fn.locate, self, id("index"), str(`index out of bounds in ${fn.set}`))
      ),
      assignStmt(arrow(id("element"), "value"), id("value")),
    ],
  };

  const walk: CDecl = {
    kind: "function",
    returnType: elementPtr,
    name: fn.walk,
    params: [thisParam, { type: u64, name: "position" }],
    body: [
      variable(elementPtr, "element", field("head")),
      whileStmt(
        binary(binary(id("element"), "!=", NULL), "&&", binary(id("position"), ">", int(0))),
        assignStmt(id("element"), arrow(id("element"), "next")),
        decrement(id("position"))
      ),
      returnStmt(id("element")),
    ],
  };

  const del: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.del,
    params: [thisParam, { type: u64, name: "index" }],
    body: [
      exprStmt(call(fn.cacheInvalidate, self)),
      ifStmt(
        binary(id("index"), "==", int(0)),
        ifStmt(binary(field("head"), "==", NULL), outOfBounds("del")),
        variable(elementPtr, "inner", arrow(field("head"), "next")),
        exprStmt(call("free", field("head"))),
        assignStmt(field("head"), id("inner")),
        decrement(field("size")),
        ifStmt(binary(id("inner"), "==", NULL), assignStmt(field("tail"), NULL)),
        returnStmt()
      ),
      variable(elementPtr, "element", call(fn.walk, self, binary(id("index"), "-", int(1)))),
      ifStmt(
        binary(
          binary(id("element"), "==", NULL),
          "||",
          binary(arrow(id("element"), "next"), "==", NULL)
        ),
        outOfBounds("del")
      ),
      variable(elementPtr, "removed", arrow(id("element"), "next")),
      assignStmt(arrow(id("element"), "next"), arrow(id("removed"), "next")),
      ifStmt(binary(id("removed"), "==", field("tail")), assignStmt(field("tail"), id("element"))),
      exprStmt(call("free", id("removed"))),
      decrement(field("size")),
    ],
  };

  const insert: CDecl = {
    kind: "function",
    returnType: voidType,
    name: fn.insert,
    params: [thisParam, { type: u64, name: "index" }, { type: elementCType, name: "value" }],
    body: [
      exprStmt(call(fn.cacheInvalidate, self)),
      ifStmt(
        binary(id("index"), "==", int(0)),
        variable(elementPtr, "new_element", call(fn.elementNew, id("value"), field("head"))),
        ifStmt(binary(field("head"), "==", NULL), assignStmt(field("tail"), id("new_element"))),
        assignStmt(field("head"), id("new_element")),
        increment(field("size")),
        returnStmt()
      ),
      variable(elementPtr, "element", call(fn.walk, self, binary(id("index"), "-", int(1)))),
      ifStmt(binary(id("element"), "==", NULL), outOfBounds("insert")),
      variable(
        elementPtr,
        "new_element",
        call(fn.elementNew, id("value"), arrow(id("element"), "next"))
      ),
      assignStmt(arrow(id("element"), "next"), id("new_element")),
      ifStmt(
        binary(arrow(id("new_element"), "next"), "==", NULL),
        assignStmt(field("tail"), id("new_element"))
      ),
      increment(field("size")),
    ],
  };

  return [
    { kind: "comment", text: label },
    elementStruct,
    listStruct,
    elementNew,
    constructor,
    destructor,
    cacheInvalidate,
    size,
    add,
    locate,
    get,
    set,
    walk,
    del,
    insert,
  ];
};

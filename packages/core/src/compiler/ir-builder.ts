/**
 * Builders for IR modules and functions
 *
 * FunctionBuilder owns the block list, the insertion point and the
 * per-function name allocator. ModuleBuilder interns string constants and
 * external declarations in first-use order.
 */

import type {
  BasicBlock,
  CallSignature,
  IRConst,
  IRDeclaration,
  IRFunction,
  IRGlobal,
  IRGlobalRef,
  IRInstruction,
  IRModule,
  IRParam,
  IRRegister,
  IRStringConstant,
  IRTerminator,
  IRType,
} from "../types/ir.js";

// =============================================================================
// VALUES
// =============================================================================

export function constInt(value: number, type: IRType = "i32"): IRConst {
  return { kind: "const", type, value };
}

export function constFloat(value: number): IRConst {
  return { kind: "const", type: "double", value };
}

export function constBool(value: boolean): IRConst {
  return { kind: "const", type: "i1", value };
}

export function nullPointer(): IRConst {
  return { kind: "const", type: "ptr", value: null };
}

/** Zero of a first-class type: 0, 0.0, false or null */
export function zeroValue(type: IRType): IRConst {
  switch (type) {
    case "i1":
      return constBool(false);
    case "double":
      return constFloat(0);
    case "ptr":
      return nullPointer();
    default:
      return constInt(0, type);
  }
}

export function irTypeEquals(a: IRType, b: IRType): boolean {
  if (typeof a === "string" || typeof b === "string") {
    return a === b;
  }
  return a.length === b.length && irTypeEquals(a.element, b.element);
}

// =============================================================================
// NAMES
// =============================================================================

/**
 * Hands out unique names: the base itself first, then base1, base2, ...
 * skipping anything already taken.
 */
export class NameAllocator {
  private readonly used = new Set<string>();
  private readonly counters = new Map<string, number>();

  fresh(base: string): string {
    if (!this.used.has(base)) {
      this.used.add(base);
      return base;
    }
    let n = this.counters.get(base) ?? 1;
    while (this.used.has(`${base}${n}`)) n++;
    this.counters.set(base, n + 1);
    const name = `${base}${n}`;
    this.used.add(name);
    return name;
  }
}

// =============================================================================
// FUNCTION BUILDER
// =============================================================================

export class FunctionBuilder {
  readonly fn: IRFunction;
  private readonly names = new NameAllocator();
  private readonly entry: BasicBlock;
  private allocas = 0;
  private block: BasicBlock;

  constructor(name: string, returnType: IRType, params: IRParam[]) {
    for (const param of params) {
      this.names.fresh(param.name);
    }
    this.fn = { name, returnType, params, blocks: [] };
    this.entry = this.createBlock("entry");
    this.block = this.entry;
  }

  /** Block receiving new instructions */
  get current(): BasicBlock {
    return this.block;
  }

  /** Append a new, empty block to the function */
  createBlock(base: string): BasicBlock {
    const block: BasicBlock = { label: this.names.fresh(base), instructions: [] };
    this.fn.blocks.push(block);
    return block;
  }

  positionAt(block: BasicBlock): void {
    this.block = block;
  }

  /** A fresh register named after `base` */
  register(base: string, type: IRType): IRRegister {
    return { kind: "register", type, name: this.names.fresh(base) };
  }

  /** Reserve a stack slot in the entry block, after earlier slots */
  alloca(allocated: IRType, base: string): IRRegister {
    const result = this.register(base, "ptr");
    this.entry.instructions.splice(this.allocas, 0, { op: "alloca", result, allocated });
    this.allocas++;
    return result;
  }

  /**
   * Append an instruction. When the insertion block already ends in a
   * terminator, a fresh block takes the instruction; nothing branches to it.
   */
  emit(instruction: IRInstruction): void {
    this.open().instructions.push(instruction);
  }

  terminate(terminator: IRTerminator): void {
    this.open().terminator = terminator;
  }

  /** Fall through to `target` unless the insertion block is already terminated */
  branchIfOpen(target: BasicBlock): void {
    if (!this.block.terminator) {
      this.block.terminator = { op: "br", target: target.label };
    }
  }

  isTerminated(): boolean {
    return this.block.terminator !== undefined;
  }

  /** Labels of blocks reachable from the entry block */
  reachable(): Set<string> {
    const byLabel = new Map(this.fn.blocks.map((b) => [b.label, b]));
    const seen = new Set<string>();
    const pending = [this.entry.label];

    for (let label = pending.pop(); label !== undefined; label = pending.pop()) {
      if (seen.has(label)) continue;
      seen.add(label);
      const terminator = byLabel.get(label)?.terminator;
      if (terminator?.op === "br") pending.push(terminator.target);
      if (terminator?.op === "condbr") pending.push(terminator.ifTrue, terminator.ifFalse);
    }
    return seen;
  }

  private open(): BasicBlock {
    if (this.block.terminator) {
      this.block = this.createBlock("unreachable");
    }
    return this.block;
  }
}

// =============================================================================
// MODULE BUILDER
// =============================================================================

export class ModuleBuilder {
  private readonly globals: IRGlobal[] = [];
  private readonly strings = new Map<string, IRStringConstant>();
  private readonly declarations = new Map<string, IRDeclaration>();
  private readonly functions: IRFunction[] = [];
  private readonly name: string;
  private readonly sourceFile?: string;

  constructor(name: string, sourceFile?: string) {
    this.name = name;
    this.sourceFile = sourceFile;
  }

  addGlobal(name: string, type: IRType): IRGlobalRef {
    this.globals.push({ name, type });
    return { kind: "global", type: "ptr", name };
  }

  /** Pointer to a private constant holding `value`, shared by equal strings */
  stringConstant(value: string): IRGlobalRef {
    let constant = this.strings.get(value);
    if (!constant) {
      const index = this.strings.size;
      constant = { name: index === 0 ? ".str" : `.str.${index}`, value };
      this.strings.set(value, constant);
    }
    return { kind: "global", type: "ptr", name: constant.name };
  }

  /** Declare an external function on first use */
  declare(name: string, signature: CallSignature): void {
    if (!this.declarations.has(name)) {
      this.declarations.set(name, { name, signature });
    }
  }

  addFunction(fn: IRFunction): void {
    this.functions.push(fn);
  }

  build(): IRModule {
    const module: IRModule = {
      name: this.name,
      globals: [...this.globals],
      strings: [...this.strings.values()],
      declarations: [...this.declarations.values()],
      functions: [...this.functions],
    };
    if (this.sourceFile !== undefined) module.sourceFile = this.sourceFile;
    return module;
  }
}

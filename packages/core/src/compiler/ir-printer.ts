/**
 * Textual rendering of IR modules in LLVM assembly syntax
 */

import type {
  BasicBlock,
  CallSignature,
  IRFunction,
  IRInstruction,
  IRModule,
  IRTerminator,
  IRType,
  IRValue,
} from "../types/ir.js";

const encoder = new TextEncoder();

export function formatType(type: IRType): string {
  if (typeof type === "string") return type;
  return `[${type.length} x ${formatType(type.element)}]`;
}

/** A double as the 64-bit hex pattern LLVM accepts for any value */
export function formatDouble(value: number): string {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return `0x${view.getBigUint64(0).toString(16).toUpperCase().padStart(16, "0")}`;
}

/** Operand without its type */
export function formatValue(value: IRValue): string {
  switch (value.kind) {
    case "register":
      return `%${value.name}`;
    case "global":
      return `@${value.name}`;
    case "const":
      if (value.value === null) return "null";
      if (typeof value.value === "boolean") return value.value ? "true" : "false";
      return value.type === "double" ? formatDouble(value.value) : String(value.value);
  }
}

function typed(value: IRValue): string {
  return `${formatType(value.type)} ${formatValue(value)}`;
}

/** `c"..."` body: printable ASCII as is, everything else as \XX, NUL-terminated */
export function escapeString(value: string): { text: string; length: number } {
  const bytes = [...encoder.encode(value), 0];
  const text = bytes
    .map((byte) =>
      byte >= 0x20 && byte <= 0x7e && byte !== 0x22 && byte !== 0x5c
        ? String.fromCharCode(byte)
        : `\\${byte.toString(16).toUpperCase().padStart(2, "0")}`
    )
    .join("");
  return { text, length: bytes.length };
}

function formatSignature(signature: CallSignature): string {
  const params = signature.params.map(formatType);
  if (signature.variadic) params.push("...");
  return `${formatType(signature.returnType)} (${params.join(", ")})`;
}

// =============================================================================
// INSTRUCTIONS
// =============================================================================

export function formatInstruction(instruction: IRInstruction): string {
  switch (instruction.op) {
    case "binary":
      return `%${instruction.result.name} = ${instruction.operator} ${typed(instruction.left)}, ${formatValue(instruction.right)}`;
    case "icmp":
    case "fcmp":
      return `%${instruction.result.name} = ${instruction.op} ${instruction.predicate} ${typed(instruction.left)}, ${formatValue(instruction.right)}`;
    case "fneg":
      return `%${instruction.result.name} = fneg ${typed(instruction.operand)}`;
    case "alloca":
      return `%${instruction.result.name} = alloca ${formatType(instruction.allocated)}`;
    case "load":
      return `%${instruction.result.name} = load ${formatType(instruction.result.type)}, ${typed(instruction.pointer)}`;
    case "store":
      return `store ${typed(instruction.value)}, ${typed(instruction.pointer)}`;
    case "call": {
      const { signature } = instruction;
      const callee = signature.variadic ? formatSignature(signature) : formatType(signature.returnType);
      const call = `call ${callee} @${instruction.callee}(${instruction.args.map(typed).join(", ")})`;
      return instruction.result ? `%${instruction.result.name} = ${call}` : call;
    }
    case "select":
      return `%${instruction.result.name} = select ${typed(instruction.condition)}, ${typed(instruction.ifTrue)}, ${typed(instruction.ifFalse)}`;
    case "gep":
      return `%${instruction.result.name} = getelementptr ${formatType(instruction.base)}, ${[instruction.pointer, ...instruction.indices].map(typed).join(", ")}`;
    case "zext":
      return `%${instruction.result.name} = zext ${typed(instruction.operand)} to ${formatType(instruction.to)}`;
  }
}

export function formatTerminator(terminator: IRTerminator): string {
  switch (terminator.op) {
    case "br":
      return `br label %${terminator.target}`;
    case "condbr":
      return `br ${typed(terminator.condition)}, label %${terminator.ifTrue}, label %${terminator.ifFalse}`;
    case "ret":
      return terminator.value ? `ret ${typed(terminator.value)}` : "ret void";
  }
}

// =============================================================================
// MODULE
// =============================================================================

function printBlock(block: BasicBlock): string {
  const lines = [`${block.label}:`, ...block.instructions.map((i) => `  ${formatInstruction(i)}`)];
  if (block.terminator) {
    lines.push(`  ${formatTerminator(block.terminator)}`);
  }
  return lines.join("\n");
}

export function printFunction(fn: IRFunction): string {
  const params = fn.params.map((p) => `${formatType(p.type)} %${p.name}`).join(", ");
  const blocks = fn.blocks.map(printBlock).join("\n\n");
  return `define ${formatType(fn.returnType)} @${fn.name}(${params}) {\n${blocks}\n}`;
}

function zeroInitializer(type: IRType): string {
  switch (type) {
    case "i1":
      return "false";
    case "double":
      return formatDouble(0);
    case "ptr":
      return "null";
    default:
      return typeof type === "string" ? "0" : "zeroinitializer";
  }
}

/**
 * Render a module as LLVM textual IR
 */
export function printModule(module: IRModule): string {
  const sections: string[] = [
    `; ModuleID = '${module.name}'\nsource_filename = "${module.sourceFile ?? module.name}"`,
  ];

  const data = [
    ...module.globals.map((g) => `@${g.name} = global ${formatType(g.type)} ${zeroInitializer(g.type)}`),
    ...module.strings.map((s) => {
      const { text, length } = escapeString(s.value);
      return `@${s.name} = private unnamed_addr constant [${length} x i8] c"${text}"`;
    }),
  ];
  if (data.length > 0) sections.push(data.join("\n"));

  if (module.declarations.length > 0) {
    sections.push(
      module.declarations
        .map((d) => {
          const params = d.signature.params.map(formatType);
          if (d.signature.variadic) params.push("...");
          return `declare ${formatType(d.signature.returnType)} @${d.name}(${params.join(", ")})`;
        })
        .join("\n")
    );
  }

  sections.push(...module.functions.map(printFunction));
  return `${sections.join("\n\n")}\n`;
}

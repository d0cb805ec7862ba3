import type { Arena } from "../arena/arena.js";
import type { NodeHandle } from "../arena/handle.js";

function indent(level: number): string {
  return "  ".repeat(level);
}

function quoteRaw(value: string): string {
  return `"${value}"`;
}

function describeNode(arena: Arena, handle: NodeHandle, level: number, lines: string[]): void {
  const node = arena.resolve(handle);

  if (node.kind === "element") {
    lines.push(`| ${indent(level)}<${node.tagName}>`);

    for (const attribute of node.attributes) {
      lines.push(`| ${indent(level + 1)}${attribute.name}=${quoteRaw(attribute.value)}`);
    }

    for (const child of node.children) {
      describeNode(arena, child, level + 1, lines);
    }
    return;
  }

  if (node.kind === "text") {
    lines.push(`| ${indent(level)}${quoteRaw(node.value)}`);
    return;
  }

  if (node.kind === "preserialized") {
    lines.push(`| ${indent(level)}#preserialized ${quoteRaw(node.fragment.html)}`);
    return;
  }

  // Fragments are transparent, like in serialized output.
  for (const child of node.children) {
    describeNode(arena, child, level, lines);
  }
}

export function describeTree(arena: Arena, root: NodeHandle): string {
  const lines: string[] = [];
  describeNode(arena, root, 0, lines);
  return lines.join("\n");
}

import type { Arena } from "../arena/arena.js";
import type { NodeHandle } from "../arena/handle.js";
import type { Attribute, SerializeOptions } from "../../public/types.js";

export const DOCTYPE = "<!DOCTYPE html>\n";

const encoder = new TextEncoder();

export function escapeText(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");
}

function serializeAttributes(attributes: readonly Attribute[]): string {
  if (attributes.length === 0) {
    return "";
  }

  const parts = attributes.map((attribute) => `${attribute.name}="${escapeAttribute(attribute.value)}"`);
  return ` ${parts.join(" ")}`;
}

function serializeNode(arena: Arena, handle: NodeHandle, out: string[]): void {
  const node = arena.resolve(handle);

  if (node.kind === "text") {
    out.push(escapeText(node.value));
    return;
  }

  if (node.kind === "preserialized") {
    out.push(node.fragment.html);
    return;
  }

  if (node.kind === "fragment") {
    for (const child of node.children) {
      serializeNode(arena, child, out);
    }
    return;
  }

  out.push(`<${node.tagName}${serializeAttributes(node.attributes)}>`);
  for (const child of node.children) {
    serializeNode(arena, child, out);
  }
  if (node.meta.hasClosingTag) {
    out.push(`</${node.tagName}>`);
  }
}

/**
 * Renders the subtree under `handle`. Handles into linked arenas are followed;
 * pre-serialized nodes are copied verbatim.
 */
export function serialize(arena: Arena, handle: NodeHandle, options: SerializeOptions = {}): string {
  const out: string[] = options.doctype ? [DOCTYPE] : [];
  serializeNode(arena, handle, out);
  return out.join("");
}

export function serializeToBytes(
  arena: Arena,
  handle: NodeHandle,
  options: SerializeOptions = {}
): Uint8Array {
  return encoder.encode(serialize(arena, handle, options));
}

import type { NodeHandle } from "../arena/handle.js";
import type {
  Attribute,
  AttributeInput,
  ChildInput,
  SerializedFragment,
  TagMeta
} from "../../public/types.js";

export interface ElementNode {
  readonly kind: "element";
  readonly tagName: string;
  readonly meta: TagMeta;
  readonly attributes: readonly Attribute[];
  readonly children: readonly NodeHandle[];
}

export interface TextNode {
  readonly kind: "text";
  readonly value: string;
}

export interface PreSerializedNode {
  readonly kind: "preserialized";
  readonly fragment: SerializedFragment;
}

/** Groups siblings where a single handle is expected. Serializes as its children only. */
export interface FragmentNode {
  readonly kind: "fragment";
  readonly children: readonly NodeHandle[];
}

export type ArenaNode = ElementNode | TextNode | PreSerializedNode | FragmentNode;

export type NodeKind = ArenaNode["kind"];

/** Input accepted wherever a replacement node is built from scratch. */
export type NodeDescription =
  | {
      readonly kind: "element";
      readonly tagName: string;
      readonly attributes?: AttributeInput | null;
      readonly children?: ChildInput;
    }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "fragment"; readonly children: ChildInput }
  | { readonly kind: "preserialized"; readonly fragment: SerializedFragment };

export type NodeVisitor = (node: ArenaNode, handle: NodeHandle, depth: number) => void;

export type ElementVisitor = (node: ElementNode, handle: NodeHandle, depth: number) => void;

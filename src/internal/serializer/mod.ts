export { DOCTYPE, escapeAttribute, escapeText, serialize, serializeToBytes } from "./serialize.js";
export { adoptHtml, preserialize } from "./fragment.js";
export { FragmentCache } from "./cache.js";

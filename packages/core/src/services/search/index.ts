/**
 * Search Provider implementations
 */

export { BraveSearchProvider } from "./brave-provider";
export { SearchToolProvider, stripHtml } from "./search-tool";
export type { SearchToolOptions } from "./search-tool";

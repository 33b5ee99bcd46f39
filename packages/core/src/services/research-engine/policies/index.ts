export {
  SearchDecisionPolicy,
  createDefaultPolicies,
  QUERY_ANGLES,
} from "./search-decision";
export {
  MarkdownRenderingPolicy,
  reportTitle,
  formatFinding,
  EMPTY_SECTION_TEXT,
} from "./markdown-rendering";
export { LlmRenderingPolicy } from "./llm-rendering";

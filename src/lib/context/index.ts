export { compose, extractBase, SNIPPET_DELIMITER } from './compose.js';
export { ResearchContext, contextVersion } from './research-context.js';
export { readContextFile, exportContextFile } from './source.js';

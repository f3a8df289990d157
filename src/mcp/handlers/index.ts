export { handleRetrieve, handleRetrieveBatch, handleSearch, handleLayers, type SearchArgs } from './patterns.js';
export { handleBuildModule } from './module.js';
export { jsonResult, errorResult, type ToolResult } from './result.js';

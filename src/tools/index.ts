export { registerManageProjectTool, handleManageProject } from './manage-project';
export { registerManageWarehouseTool, handleManageWarehouse } from './manage-warehouse';
export { registerQueryWarehouseTool, handleQueryWarehouse } from './query-warehouse';
export type { ToolResponse } from './registry';

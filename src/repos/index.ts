export { createProject, getProject } from './projects';
export { SqliteWarehouseStore, decodeWarehouseRow, findWarehouseIntegrityIssues } from './warehouses';

import { CatalogBackendError, classifyBackendError } from '../domain/backend-error';
import { type Project, type ProjectId, type Result, newProjectId, projectIdSchema } from '../domain/types';
import type { Connection } from '../db/client';
import { err, execute, now, ok, queryOne } from './base';

interface ProjectRow {
  project_id: string;
  name: string;
  created_at: string;
}

function rowToProject(row: ProjectRow): Result<Project, CatalogBackendError> {
  const id = projectIdSchema.safeParse(row.project_id);
  if (!id.success) {
    return err(CatalogBackendError.unexpected(new Error(`Stored project id '${row.project_id}' is not a UUID`)));
  }
  return ok({
    id: id.data,
    name: row.name,
    createdAt: new Date(row.created_at),
  });
}

export function createProject(
  db: Connection,
  params: { name: string; id?: ProjectId }
): Result<Project, CatalogBackendError> {
  try {
    const id = params.id ?? newProjectId();
    const createdAt = now();
    execute(db, 'INSERT INTO projects (project_id, name, created_at) VALUES (?, ?, ?)', [id, params.name, createdAt]);
    return rowToProject({ project_id: id, name: params.name, created_at: createdAt });
  } catch (error) {
    return err(classifyBackendError(error));
  }
}

/** Returns null when the project does not exist. */
export function getProject(db: Connection, id: ProjectId): Result<Project | null, CatalogBackendError> {
  try {
    const row = queryOne<ProjectRow>(db, 'SELECT project_id, name, created_at FROM projects WHERE project_id = ?', [id]);
    return row ? rowToProject(row) : ok(null);
  } catch (error) {
    return err(classifyBackendError(error));
  }
}

/**
 * Domain Types for the warehouse catalog.
 *
 * - Identifiers are branded UUID strings produced by zod schemas
 * - Warehouses are project scoped; names are unique per project
 * - Status governs visibility: default reads only see ACTIVE warehouses
 * - Storage profiles are opaque beyond their `type` discriminator
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

// ============================================================================
// Identifiers
// ============================================================================

// Accept dashed or dashless UUIDs; always normalize to the dashed lowercase form.
const UUID_REGEX = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export function normalizeUuid(value: string): string {
  const hex = value.replace(/-/g, '').toLowerCase();
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export const uuidSchema = z.string().trim().regex(UUID_REGEX, 'Invalid UUID').transform(normalizeUuid);

export const warehouseIdSchema = uuidSchema.brand<'WarehouseId'>();
export const projectIdSchema = uuidSchema.brand<'ProjectId'>();
export const secretIdentSchema = uuidSchema.brand<'SecretIdent'>();

export type WarehouseId = z.infer<typeof warehouseIdSchema>;
export type ProjectId = z.infer<typeof projectIdSchema>;
export type SecretIdent = z.infer<typeof secretIdentSchema>;

export function newWarehouseId(): WarehouseId {
  return warehouseIdSchema.parse(randomUUID());
}

export function newProjectId(): ProjectId {
  return projectIdSchema.parse(randomUUID());
}

// ============================================================================
// Enums
// ============================================================================

export enum WarehouseStatus {
  /** The warehouse is active and can be used */
  ACTIVE = 'active',
  /** The warehouse is inactive and cannot be used */
  INACTIVE = 'inactive',
}

const WAREHOUSE_STATUS_ORDER: readonly WarehouseStatus[] = [WarehouseStatus.ACTIVE, WarehouseStatus.INACTIVE];

export const warehouseStatusSchema = z.nativeEnum(WarehouseStatus);

export function compareWarehouseStatus(a: WarehouseStatus, b: WarehouseStatus): number {
  return WAREHOUSE_STATUS_ORDER.indexOf(a) - WAREHOUSE_STATUS_ORDER.indexOf(b);
}

// ============================================================================
// Opaque configuration values
// ============================================================================

export const storageProfileSchema = z.object({ type: z.string().min(1) }).passthrough();
export type StorageProfile = z.infer<typeof storageProfileSchema>;

export const tabularDeleteProfileSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('hard') }),
  z.object({ type: z.literal('soft'), expirationSeconds: z.number().int().positive() }),
]);
export type TabularDeleteProfile = z.infer<typeof tabularDeleteProfileSchema>;

// ============================================================================
// Interfaces
// ============================================================================

export interface Project {
  id: ProjectId;
  name: string;
  createdAt: Date;
}

export interface GetWarehouseResponse {
  /** ID of the warehouse. */
  id: WarehouseId;
  /** Name of the warehouse. */
  name: string;
  /** Project ID in which the warehouse is created. */
  projectId: ProjectId;
  storageProfile: StorageProfile;
  storageSecretId?: SecretIdent;
  status: WarehouseStatus;
  tabularDeleteProfile: TabularDeleteProfile;
  /** Whether the warehouse is protected from being deleted. */
  protected: boolean;
}

export interface CreateWarehouseParams {
  name: string;
  projectId: ProjectId;
  storageProfile: StorageProfile;
  tabularDeleteProfile: TabularDeleteProfile;
  storageSecretId?: SecretIdent;
}

export interface DeleteWarehouseQuery {
  /** Delete even if the warehouse is protected or still has content. */
  force: boolean;
}

// ============================================================================
// Result Type
// ============================================================================

export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

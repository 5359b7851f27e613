/**
 * Storage Zod Schemas
 *
 * Validation for every record that enters the system from outside:
 * inventory records, the reference dataset, the storage topology,
 * the persisted location map, BOM lines and stock snapshots.
 */

import { z } from 'zod';

// ============================================
// ENUMS
// ============================================

export const componentCategorySchema = z.enum([
  'resistor',
  'capacitor',
  'diode',
  'transistor',
  'ic',
  'potentiometer',
  'led',
]);

export const componentPrioritySchema = z.enum(['essential', 'optional']);

export const sizeClassSchema = z.enum(['small', 'medium', 'large', 'tall']);

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

// ============================================
// CATALOG RECORDS
// ============================================

/** One record from the inventory system */
export const inventoryRecordSchema = z.object({
  category: componentCategorySchema,
  subtype: optionalText,
  value: z.string().trim().min(1, 'value is required'),
  quantity: z.number().finite().nonnegative(),
  minQuantity: z.number().finite().nonnegative().default(0),
});

export type InventoryRecord = z.infer<typeof inventoryRecordSchema>;

/** One entry of the reference dataset, within its category list */
export const referenceEntrySchema = z.object({
  value: z.string().trim().min(1, 'value is required'),
  subtype: optionalText,
  usageCount: z.number().int().nonnegative().default(0),
  priority: componentPrioritySchema.default('optional'),
});

export type ReferenceEntry = z.infer<typeof referenceEntrySchema>;

/** Reference entry with its category attached */
export const referenceRecordSchema = referenceEntrySchema.extend({
  category: componentCategorySchema,
});

export type ReferenceRecord = z.infer<typeof referenceRecordSchema>;

/**
 * Reference dataset file: category -> entries.
 * Entries stay unvalidated here so one bad entry is reported on its own.
 */
export const referenceDatasetSchema = z.record(componentCategorySchema, z.array(z.unknown()));

export type ReferenceDataset = z.infer<typeof referenceDatasetSchema>;

// ============================================
// TOPOLOGY
// ============================================

const unitIdSchema = z.string().trim().regex(/^[A-Za-z]+\d+$/, 'unit must look like "U1"');
const drawerIdSchema = z.string().trim().regex(/^[A-Za-z]+\d+$/, 'drawer must look like "S5"');

export const drawerDefinitionSchema = z.object({
  unit: unitIdSchema,
  drawer: drawerIdSchema,
  sizeClass: sizeClassSchema,
});

/** Shorthand for consecutive drawers: { unit: "U1", prefix: "S", from: 1, to: 16 } */
export const drawerRangeSchema = z
  .object({
    unit: unitIdSchema,
    prefix: z.string().trim().regex(/^[A-Za-z]+$/, 'prefix must be letters'),
    from: z.number().int().positive(),
    to: z.number().int().positive(),
    sizeClass: sizeClassSchema,
  })
  .refine((range) => range.from <= range.to, { message: '"from" must not exceed "to"' });

export const topologyEntrySchema = z.union([drawerDefinitionSchema, drawerRangeSchema]);

export type TopologyEntry = z.infer<typeof topologyEntrySchema>;

export const topologyConfigSchema = z.record(componentCategorySchema, z.array(topologyEntrySchema));

export type TopologyConfig = z.infer<typeof topologyConfigSchema>;

// ============================================
// LOCATION MAP
// ============================================

export const storageSlotSchema = z.object({
  unit: unitIdSchema,
  drawer: drawerIdSchema,
  compartment: z.number().int().min(1).max(4).nullable().default(null),
});

export const locationAssignmentsSchema = z.record(z.string(), z.array(storageSlotSchema).min(1));

export const versionedLocationMapSchema = z.object({
  version: z.number().int().nonnegative(),
  updatedAt: z.string().nullable().default(null),
  assignments: locationAssignmentsSchema,
  consumedDrawers: z.array(z.string()).default([]),
});

/** Versioned snapshot, or a bare assignment object read as version 0 */
export const locationMapFileSchema = z.union([
  versionedLocationMapSchema,
  locationAssignmentsSchema.transform((assignments) => ({
    version: 0,
    updatedAt: null,
    assignments,
    consumedDrawers: [],
  })),
]);

// ============================================
// PICKING INPUTS
// ============================================

export const bomLineSchema = z.object({
  reference: optionalText,
  name: z.string().trim().min(1, 'name is required'),
  quantity: z.coerce.number().int().positive('quantity must be a positive whole number'),
});

export const bomSchema = z.array(bomLineSchema);

export const stockSnapshotSchema = z.record(z.string(), z.number().finite().nonnegative());

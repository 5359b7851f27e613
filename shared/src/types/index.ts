/**
 * Shared TypeScript types for drawermap
 *
 * Entity types for components, storage slots, location maps and pick lists.
 * Pure interfaces only - behaviour lives in ../domain.
 */

// ============================================
// COMPONENTS
// ============================================

export type ComponentCategory =
  | 'resistor'
  | 'capacitor'
  | 'diode'
  | 'transistor'
  | 'ic'
  | 'potentiometer'
  | 'led';

export type ComponentPriority = 'essential' | 'optional';

export type CapacitorSubtype = 'ceramic' | 'film' | 'electrolytic';

export type TransistorSubtype = 'npn' | 'pnp' | 'jfet' | 'mosfet';

export type PotentiometerTaper = 'A' | 'B' | 'C' | 'W' | 'trim';

/** (category, subtype, value) - uniquely names a component type */
export interface ComponentIdentity {
  category: ComponentCategory;
  /** Dielectric, polarity, LED size or pot taper; null where the category has none */
  subtype: string | null;
  /** Canonical value: "4.7K", "100nF", "1N4148", "Red" */
  value: string;
}

export interface ComponentSpec extends ComponentIdentity {
  /** Identity key, e.g. "capacitor:ceramic:100nF" */
  key: string;
  usageCount: number;
  priority: ComponentPriority;
  quantityOnHand: number;
  minQuantity: number;
  sources: Array<'inventory' | 'reference'>;
}

// ============================================
// STORAGE
// ============================================

export type SizeClass = 'small' | 'medium' | 'large' | 'tall';

export interface DrawerDefinition {
  unit: string;
  drawer: string;
  sizeClass: SizeClass;
}

/** One physical location. compartment is null for large/tall drawers. */
export interface StorageSlot {
  unit: string;
  drawer: string;
  compartment: number | null;
}

/** Ordered drawer ranges reserved per category */
export type AllocationTopology = Partial<Record<ComponentCategory, DrawerDefinition[]>>;

/** Identity key -> ordered slots, first entry is primary */
export type LocationAssignments = Record<string, StorageSlot[]>;

export interface LocationMap {
  version: number;
  updatedAt: string | null;
  assignments: LocationAssignments;
  /** Drawer keys ("U1-S5") consumed by any run, never handed out again */
  consumedDrawers: string[];
}

// ============================================
// PICKING
// ============================================

export interface BomLine {
  /** Reference designator such as "R1"; optional */
  reference: string | null;
  name: string;
  quantity: number;
}

/** Identity key -> quantity on hand */
export type StockSnapshot = Record<string, number>;

export type MatchMethod = 'exact' | 'fuzzy' | 'unmatched';

export interface PickListEntry {
  /** Position of the line in the BOM */
  lineIndex: number;
  reference: string | null;
  name: string;
  identity: ComponentIdentity | null;
  key: string | null;
  matchMethod: MatchMethod;
  confidence: number;
  required: number;
  onHand: number;
  slot: StorageSlot | null;
  /** "U1-S5-1" or "unlocated" */
  location: string;
  sufficient: boolean;
  shortfall: number;
}

export interface PickGroup {
  /** Slot label, or null for the trailing unlocated group */
  location: string | null;
  slot: StorageSlot | null;
  entries: PickListEntry[];
}

export interface ShortageLine {
  key: string | null;
  name: string;
  shortfall: number;
  onHand: number;
}

export interface PickSummary {
  totalLineItems: number;
  uniqueLocations: number;
  fullyInStock: number;
  shortages: ShortageLine[];
}

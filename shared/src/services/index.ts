/**
 * Shared Services
 *
 * Everything that touches the filesystem or the inventory gateway.
 * The domain layer stays pure; these modules wire it to I/O.
 */

export * from './bom/index.js';
export * from './inventory/index.js';
export * from './catalog/catalogService.js';
export * from './locationMap/locationMapStore.js';
export * from './allocation/allocationRunner.js';
export * from './locations/locationPush.js';
export * from './locations/missingLocations.js';
export * from './stock/stockMover.js';
export * from './picking/pickingService.js';
export * from './labels/labelExport.js';

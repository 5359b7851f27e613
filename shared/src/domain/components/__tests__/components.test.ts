/**
 * Unit tests for the component value codec and identity helpers
 */

import {
    formatCapacitance,
    formatResistance,
    normalizeColour,
    normalizeLedSize,
    normalizePartNumber,
    parseCapacitance,
    parseResistance,
} from '../values.js';
import {
    canonicalIdentity,
    compareSlots,
    displayName,
    identityKey,
    parseIdentityKey,
    parseSlotLabel,
    slotLabel,
} from '../identity.js';
import type { StorageSlot } from '../../../types/index.js';

describe('parseResistance', () => {
    it('reads decimal, RKM and ohm-suffixed notation', () => {
        expect(parseResistance('4.7k')).toBe(4700);
        expect(parseResistance('4K7')).toBe(4700);
        expect(parseResistance('100 ohm')).toBe(100);
        expect(parseResistance('10kΩ')).toBe(10_000);
        expect(parseResistance('1M')).toBe(1_000_000);
        expect(parseResistance('0R47')).toBe(0.47);
    });

    it('rejects text that is not a resistance', () => {
        expect(parseResistance('abc')).toBeNull();
        expect(parseResistance('4.7K7')).toBeNull();
        expect(parseResistance('0')).toBeNull();
    });
});

describe('formatResistance', () => {
    it('uses R, K and M suffixes', () => {
        expect(formatResistance(100)).toBe('100R');
        expect(formatResistance(4700)).toBe('4.7K');
        expect(formatResistance(2_200_000)).toBe('2.2M');
    });
});

describe('parseCapacitance / formatCapacitance', () => {
    it('normalizes microfarad notation to the smallest readable unit', () => {
        expect(formatCapacitance(parseCapacitance('0.1uF') ?? 0)).toBe('100nF');
        expect(formatCapacitance(parseCapacitance('4.7 µF') ?? 0)).toBe('4.7uF');
        expect(formatCapacitance(parseCapacitance('1n5') ?? 0)).toBe('1.5nF');
        expect(formatCapacitance(parseCapacitance('22p') ?? 0)).toBe('22pF');
    });

    it('rejects malformed values', () => {
        expect(parseCapacitance('1.5n5')).toBeNull();
        expect(parseCapacitance('100')).toBeNull();
    });
});

describe('text normalizers', () => {
    it('normalizes part numbers, colours and LED sizes', () => {
        expect(normalizePartNumber('  tl072 ')).toBe('TL072');
        expect(normalizeColour('warm  WHITE')).toBe('Warm White');
        expect(normalizeLedSize('5 MM')).toBe('5mm');
        expect(normalizeLedSize('big')).toBeNull();
    });
});

describe('canonicalIdentity', () => {
    it('canonicalizes subtype and value', () => {
        expect(canonicalIdentity('capacitor', 'Ceramic', '0.1uF')).toEqual({
            ok: true,
            identity: { category: 'capacitor', subtype: 'ceramic', value: '100nF' },
        });
    });

    it('drops the subtype for categories that have none', () => {
        expect(canonicalIdentity('resistor', 'metal film', '4k7')).toEqual({
            ok: true,
            identity: { category: 'resistor', subtype: null, value: '4.7K' },
        });
    });

    it('requires a dielectric for capacitors', () => {
        const result = canonicalIdentity('capacitor', null, '100nF');
        expect(result.ok).toBe(false);
    });

    it('rejects values that do not fit the category', () => {
        expect(canonicalIdentity('resistor', null, 'TL072').ok).toBe(false);
    });
});

describe('identity keys', () => {
    it('round-trips through the key form', () => {
        const identity = { category: 'capacitor' as const, subtype: 'ceramic', value: '100nF' };
        expect(identityKey(identity)).toBe('capacitor:ceramic:100nF');
        expect(parseIdentityKey('capacitor:ceramic:100nF')).toEqual(identity);
        expect(parseIdentityKey('resistor::4.7K')).toEqual({ category: 'resistor', subtype: null, value: '4.7K' });
    });

    it('rejects unknown categories and empty values', () => {
        expect(parseIdentityKey('widget::x')).toBeNull();
        expect(parseIdentityKey('resistor::')).toBeNull();
        expect(parseIdentityKey('resistor')).toBeNull();
    });
});

describe('displayName', () => {
    it('names each category the way the drawers are labelled', () => {
        expect(displayName({ category: 'resistor', subtype: null, value: '4.7K' })).toBe('4.7K Resistor');
        expect(displayName({ category: 'capacitor', subtype: 'ceramic', value: '100nF' })).toBe('100nF Ceramic Capacitor');
        expect(displayName({ category: 'transistor', subtype: 'npn', value: '2N5088' })).toBe('2N5088 NPN');
        expect(displayName({ category: 'potentiometer', subtype: 'B', value: '100K' })).toBe('B100K Pot');
        expect(displayName({ category: 'potentiometer', subtype: 'trim', value: '100K' })).toBe('100K Trimpot');
        expect(displayName({ category: 'led', subtype: '3mm', value: 'Red' })).toBe('3mm Red LED');
    });
});

describe('slot labels', () => {
    it('formats and parses labels', () => {
        expect(slotLabel({ unit: 'U1', drawer: 'S5', compartment: 1 })).toBe('U1-S5-1');
        expect(slotLabel({ unit: 'U2', drawer: 'L1', compartment: null })).toBe('U2-L1');
        expect(parseSlotLabel('u1-s5-2')).toEqual({ unit: 'U1', drawer: 'S5', compartment: 2 });
        expect(parseSlotLabel('U2-L1')).toEqual({ unit: 'U2', drawer: 'L1', compartment: null });
        expect(parseSlotLabel('bogus')).toBeNull();
    });

    it('orders slots physically with numeric drawer comparison', () => {
        const slots: StorageSlot[] = [
            { unit: 'U1', drawer: 'S7', compartment: 1 },
            { unit: 'U2', drawer: 'M1', compartment: 1 },
            { unit: 'U1', drawer: 'S5', compartment: 2 },
            { unit: 'U1', drawer: 'S31', compartment: 1 },
            { unit: 'U1', drawer: 'S5', compartment: 1 },
        ];
        expect([...slots].sort(compareSlots).map(slotLabel)).toEqual([
            'U1-S5-1',
            'U1-S5-2',
            'U1-S7-1',
            'U1-S31-1',
            'U2-M1-1',
        ]);
    });
});

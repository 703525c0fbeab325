import { describe, expect, it } from 'vitest';
import { resolveSelectedFuels, toggleFuel } from './fuelSelection';

describe('fuelSelection', () => {
  describe('resolveSelectedFuels', () => {
    it('selects every fuel of a country with no selection yet', () => {
      expect([...resolveSelectedFuels(null, 'India', ['Coal', 'Solar'])]).toEqual(['Coal', 'Solar']);
    });

    it('keeps the selection made for the same country', () => {
      const fuels = new Set(['Solar']);
      const resolved = resolveSelectedFuels({ country: 'India', fuels }, 'India', ['Coal', 'Solar']);

      expect(resolved).toBe(fuels);
    });

    it('drops a selection made for another country on the first render of the new one', () => {
      const resolved = resolveSelectedFuels(
        { country: 'India', fuels: new Set(['Coal']) },
        'Nepal',
        ['Hydro', 'Solar']
      );

      expect([...resolved]).toEqual(['Hydro', 'Solar']);
    });

    it('keeps an empty selection for the same country', () => {
      const resolved = resolveSelectedFuels({ country: 'India', fuels: new Set() }, 'India', ['Coal']);

      expect(resolved.size).toBe(0);
    });
  });

  describe('toggleFuel', () => {
    it('adds a missing fuel and removes a present one without mutating the input', () => {
      const fuels = new Set(['Coal']);

      expect([...toggleFuel(fuels, 'Solar')]).toEqual(['Coal', 'Solar']);
      expect([...toggleFuel(fuels, 'Coal')]).toEqual([]);
      expect([...fuels]).toEqual(['Coal']);
    });
  });
});

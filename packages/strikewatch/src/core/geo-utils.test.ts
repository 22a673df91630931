import { describe, expect, it } from 'vitest';
import { boundingBoxAround, distanceKm, isValidCoordinate, longitudeRanges } from './geo-utils.js';

describe('geo utils', () => {
  describe('boundingBoxAround', () => {
    it('should span one degree each way for 111 km at the equator', () => {
      const box = boundingBoxAround({ lat: 0, lon: 0 }, 111);
      expect(box.minLat).toBeCloseTo(-1, 10);
      expect(box.maxLat).toBeCloseTo(1, 10);
      expect(box.minLon).toBeCloseTo(-1, 10);
      expect(box.maxLon).toBeCloseTo(1, 10);
    });

    it('should double the longitude span at 60 degrees', () => {
      const box = boundingBoxAround({ lat: 60, lon: 10 }, 55.5);
      expect(box.maxLat - box.minLat).toBeCloseTo(1, 10);
      expect(box.maxLon - box.minLon).toBeCloseTo(2, 10);
    });

    it('should keep the longitude span finite at the pole', () => {
      const box = boundingBoxAround({ lat: 90, lon: 0 }, 10);
      expect(box.maxLon).toBeCloseTo(10 / 1.11, 6);
    });
  });

  describe('longitudeRanges', () => {
    it('should keep a box inside the world as one range', () => {
      expect(longitudeRanges({ minLat: 0, maxLat: 1, minLon: -1, maxLon: 1 })).toEqual([{ minLon: -1, maxLon: 1 }]);
    });

    it('should split a box that crosses +180', () => {
      expect(longitudeRanges({ minLat: 0, maxLat: 1, minLon: 179.5, maxLon: 180.5 })).toEqual([
        { minLon: 179.5, maxLon: 180 },
        { minLon: -180, maxLon: -179.5 },
      ]);
    });

    it('should split a box that crosses -180', () => {
      expect(longitudeRanges({ minLat: 0, maxLat: 1, minLon: -180.5, maxLon: -179.5 })).toEqual([
        { minLon: 179.5, maxLon: 180 },
        { minLon: -180, maxLon: -179.5 },
      ]);
    });

    it('should cover every longitude for a box wider than the world', () => {
      expect(longitudeRanges({ minLat: 89, maxLat: 91, minLon: -900, maxLon: 900 })).toEqual([
        { minLon: -180, maxLon: 180 },
      ]);
    });
  });

  describe('distanceKm', () => {
    it('should measure one degree of longitude on the equator', () => {
      expect(distanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(111.195, 2);
    });

    it('should be zero for identical points', () => {
      expect(distanceKm({ lat: 45.76, lon: 4.84 }, { lat: 45.76, lon: 4.84 })).toBe(0);
    });
  });

  describe('isValidCoordinate', () => {
    it('should accept bounds and reject values outside them', () => {
      expect(isValidCoordinate({ lat: 90, lon: -180 })).toBe(true);
      expect(isValidCoordinate({ lat: 90.1, lon: 0 })).toBe(false);
      expect(isValidCoordinate({ lat: 0, lon: Number.NaN })).toBe(false);
    });
  });
});

import { describe, it, expect } from 'vitest';
import type { TrackSummary } from '@trackstat/core';
import {
  formatDistanceKm,
  formatElevationM,
  formatSummaryJson,
  formatSummaryText,
} from '../src/format.js';

const SUMMARY: TrackSummary = {
  segmentCount: 3,
  pointCount: 42,
  totalDistanceM: 12345.678,
  ascentM: 321.06,
  descentM: 298.94,
};

describe('formatDistanceKm', () => {
  it('converts meters to kilometers with two decimals', () => {
    expect(formatDistanceKm(1234.567)).toBe('1.23');
    expect(formatDistanceKm(0)).toBe('0.00');
    expect(formatDistanceKm(5000)).toBe('5.00');
  });
});

describe('formatElevationM', () => {
  it('keeps one decimal', () => {
    expect(formatElevationM(12.34)).toBe('12.3');
    expect(formatElevationM(0)).toBe('0.0');
    expect(formatElevationM(10)).toBe('10.0');
  });
});

describe('formatSummaryText', () => {
  it('renders one line per statistic', () => {
    expect(formatSummaryText('hike.gpx', SUMMARY)).toEqual([
      'File: hike.gpx',
      'Segments: 3',
      'Points: 42',
      'Distance: 12.35 km',
      'Ascent: 321.1 m',
      'Descent: 298.9 m',
    ]);
  });
});

describe('formatSummaryJson', () => {
  it('renders the rounded statistics as numbers', () => {
    expect(JSON.parse(formatSummaryJson('hike.gpx', SUMMARY))).toEqual({
      file: 'hike.gpx',
      segments: 3,
      points: 42,
      distanceKm: 12.35,
      ascentM: 321.1,
      descentM: 298.9,
    });
  });
});

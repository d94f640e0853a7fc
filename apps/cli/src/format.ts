/**
 * Summary rendering for the terminal.
 *
 * Distance is shown in kilometers with two decimals, elevation in meters
 * with one. The JSON form carries the same rounded values as numbers.
 */

import type { TrackSummary } from '@trackstat/core';

export function formatDistanceKm(distanceM: number): string {
  return (distanceM / 1000).toFixed(2);
}

export function formatElevationM(elevationM: number): string {
  return elevationM.toFixed(1);
}

export function formatSummaryText(file: string, summary: TrackSummary): string[] {
  return [
    `File: ${file}`,
    `Segments: ${summary.segmentCount}`,
    `Points: ${summary.pointCount}`,
    `Distance: ${formatDistanceKm(summary.totalDistanceM)} km`,
    `Ascent: ${formatElevationM(summary.ascentM)} m`,
    `Descent: ${formatElevationM(summary.descentM)} m`,
  ];
}

export function formatSummaryJson(file: string, summary: TrackSummary): string {
  return JSON.stringify({
    file,
    segments: summary.segmentCount,
    points: summary.pointCount,
    distanceKm: Number(formatDistanceKm(summary.totalDistanceM)),
    ascentM: Number(formatElevationM(summary.ascentM)),
    descentM: Number(formatElevationM(summary.descentM)),
  });
}

import { describe, it, expect } from 'vitest';
import { classifyElevationDelta } from '../src/elevation.js';

describe('classifyElevationDelta', () => {
  it('counts a rise as ascent', () => {
    expect(classifyElevationDelta({ ele: 100 }, { ele: 120 })).toEqual({ ascentM: 20, descentM: 0 });
  });

  it('counts a drop as descent, as a positive magnitude', () => {
    expect(classifyElevationDelta({ ele: 120 }, { ele: 110 })).toEqual({ ascentM: 0, descentM: 10 });
  });

  it('counts no change as neither', () => {
    expect(classifyElevationDelta({ ele: 42 }, { ele: 42 })).toEqual({ ascentM: 0, descentM: 0 });
  });

  it('skips a pair when either side has no elevation', () => {
    expect(classifyElevationDelta({}, { ele: 500 })).toEqual({ ascentM: 0, descentM: 0 });
    expect(classifyElevationDelta({ ele: 500 }, {})).toEqual({ ascentM: 0, descentM: 0 });
    expect(classifyElevationDelta({}, {})).toEqual({ ascentM: 0, descentM: 0 });
  });

  it('treats 0 m as a real elevation, not a missing one', () => {
    expect(classifyElevationDelta({ ele: 0 }, { ele: 7 })).toEqual({ ascentM: 7, descentM: 0 });
    expect(classifyElevationDelta({ ele: -3 }, { ele: 0 })).toEqual({ ascentM: 3, descentM: 0 });
  });
});

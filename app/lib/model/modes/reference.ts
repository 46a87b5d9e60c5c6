import { ClubParams, PayoffTable, PlayerParams } from '../types';

/**
 * REFERENCE CONFIGURATION
 * Values the interactive models open with. Sliders move away from these;
 * the store's reset returns to them.
 */

export const DEFAULT_SAMPLE_COUNT = 1000;

// (Saudi, Europe) payoffs. Anti-coordination: each side does best playing
// the opposite of the other, and Star/Star is worst for both.
export const REFERENCE_PAYOFFS: PayoffTable = Object.freeze({
  'Youth/Youth': Object.freeze({ saudi: 4, europe: 4 }),
  'Youth/Star': Object.freeze({ saudi: 2, europe: 5 }),
  'Star/Youth': Object.freeze({ saudi: 5, europe: 2 }),
  'Star/Star': Object.freeze({ saudi: 1, europe: 1 }),
});

export function getReferenceClubParams(): ClubParams {
  return {
    x0: 0.5,
    y0: 0.5,
    tEnd: 10,
  };
}

export function getReferencePlayerParams(): PlayerParams {
  return {
    a0: 2.5,
    d0: 2.0,
    b: 1.4,
    pGrow: 1.0,
    mGrow: 5.0,
    x0: 0.6,
    tEnd: 10,
  };
}

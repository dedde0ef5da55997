import type { OrbitalElement } from '@uplink/shared';

export const TEST_SAT: OrbitalElement = {
  name: 'TESTSAT-1',
  line1: '1 99901U 24001A   24275.50000000  .00001000  00000-0  10000-3 0  9995',
  line2: '2 99901  53.0000 120.0000 0001000  90.0000 270.0000 15.06000000 10003',
};

export const TEST_TLE_TEXT = [TEST_SAT.name, TEST_SAT.line1, TEST_SAT.line2].join('\n');

/* eslint-disable no-console */
import { Gs1OptionsError, parseGs1, toFieldMap } from '../src/gs1';

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(message);
}

const GS = '\x1d';

const LABELS: Array<{ barcode: string; expected: Array<[string, string]> }> = [
  {
    barcode: '01062867400002491728043010GB2C2171490437969853',
    expected: [['01', '06286740000249'], ['17', '280430'], ['10', 'GB2C'], ['21', '71490437969853']],
  },
  {
    barcode: '01062911037315552164SSI54CE688QZ1727021410C601',
    expected: [['01', '06291103731555'], ['21', '64SSI54CE688QZ'], ['17', '270214'], ['10', 'C601']],
  },
  {
    barcode: '010622300001036517270903103056442130564439945626',
    expected: [['01', '06223000010365'], ['17', '270903'], ['10', '305644'], ['21', '30564439945626']],
  },
  {
    barcode: '010625115902606717290400104562202106902409792902',
    expected: [['01', '06251159026067'], ['17', '290400'], ['10', '456220'], ['21', '06902409792902']],
  },
];

function run() {
  console.log('== GS1 decoder smoke test ==');

  // ----------------------------
  // Labels scanned without separators
  // ----------------------------
  for (const { barcode, expected } of LABELS) {
    const result = parseGs1(barcode);
    const got = result.elements.map((e) => `${e.ai}:${e.raw}`).join(' ');
    console.log(`${barcode} -> ${got} (${result.confidence})`);
    assert(
      got === expected.map(([ai, raw]) => `${ai}:${raw}`).join(' '),
      `Mismatch for ${barcode}: "${got}"`
    );
    assert(!result.elements.some((e) => e.ai === '90'), `Unexpected AI(90) in ${barcode}`);
  }

  // ----------------------------
  // Separated input + field map
  // ----------------------------
  const separated = parseGs1(`01062850960008421729013110ABC123${GS}21SN-77`);
  console.log('Field map:', toFieldMap(separated, { includeConfidence: true }));
  assert(separated.strategy === 'fast-path', `Expected fast path, got ${separated.strategy}`);
  assert(separated.confidence === 1, `Expected confidence 1, got ${separated.confidence}`);

  // ----------------------------
  // Negative cases
  // ----------------------------
  const empty = parseGs1('');
  assert(empty.elements.length === 0 && empty.confidence === 0, 'Expected an empty parse for empty input');

  let threw = false;
  try {
    parseGs1(LABELS[0].barcode, { beamWidth: 0 });
  } catch (error) {
    threw = error instanceof Gs1OptionsError;
  }
  assert(threw, 'Expected Gs1OptionsError for beamWidth 0');

  console.log('✅ All GS1 decoder smoke tests passed.');
}

run();

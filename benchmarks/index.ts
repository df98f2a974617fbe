/**
 * Compares reading and writing through codecs against plain JSON.parse and
 * JSON.stringify, for both record layouts.
 *
 * Run with: npm run bench
 */

import { run, bench, group, summary } from 'mitata';
import * as p from 'polycodec';

// ============================================================================
// Codecs
// ============================================================================

interface Person {
  name: string;
  age: number;
  email: string | undefined;
  scores: number[];
  active: boolean;
}

const PersonCodec = p.toCodec(
  p.object({
    name: p.fieldOf(p.string, 'name'),
    age: p.fieldOf(p.int, 'age'),
    email: p.optionalFieldOf(p.string, 'email'),
    scores: p.fieldOf(p.listOf(p.int), 'scores'),
    active: p.fieldOf(p.bool, 'active'),
  })
);

// ============================================================================
// Test data
// ============================================================================

const testPerson: Person = {
  name: 'Test User',
  age: 30,
  email: 'user@example.test',
  scores: [100, 95, 87, 92],
  active: true,
};

const testPersonLarge: Person = {
  name: 'Another Test User with a very long name that takes a while to copy',
  age: 45,
  email: undefined,
  scores: Array.from({ length: 100 }, (_, i) => i * 10),
  active: false,
};

const named = p.JsonOps.INSTANCE;
const compressed = p.JsonOps.COMPRESSED;

const cases: [string, Person][] = [
  ['Person (small)', testPerson],
  ['Person (large)', testPersonLarge],
];

console.log('Text sizes:');
for (const [description, person] of cases) {
  const namedText = JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, named, person)));
  const compressedText = JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, compressed, person)));
  console.log(`  ${description}:`);
  console.log(`    named:      ${namedText.length} chars`);
  console.log(`    compressed: ${compressedText.length} chars`);
}
console.log('');

// ============================================================================
// Benchmarks
// ============================================================================

for (const [description, person] of cases) {
  const namedText = JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, named, person)));
  const compressedText = JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, compressed, person)));

  summary(() => {
    group(`${description} decode`, () => {
      bench('JSON.parse', () => {
        JSON.parse(namedText);
      });

      bench('polycodec (named)', () => {
        p.parse(PersonCodec, named, JSON.parse(namedText));
      }).baseline();

      bench('polycodec (compressed)', () => {
        p.parse(PersonCodec, compressed, JSON.parse(compressedText));
      });
    });
  });

  summary(() => {
    group(`${description} encode`, () => {
      bench('JSON.stringify', () => {
        JSON.stringify(person);
      });

      bench('polycodec (named)', () => {
        JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, named, person)));
      }).baseline();

      bench('polycodec (compressed)', () => {
        JSON.stringify(p.getOrThrow(p.encodeStart(PersonCodec, compressed, person)));
      });
    });
  });
}

// Partial results: one bad score out of a hundred
const damaged: p.JsonValue = {
  name: testPersonLarge.name,
  age: testPersonLarge.age,
  scores: [...testPersonLarge.scores, 'x'],
  active: testPersonLarge.active,
};

summary(() => {
  group('Partial decode', () => {
    bench('strict (error with partial)', () => {
      p.parse(PersonCodec, named, damaged);
    }).baseline();

    bench('promotePartial', () => {
      p.parse(p.promotePartial(PersonCodec, () => {}), named, damaged);
    });
  });
});

await run({
  colors: true,
});

import { run, bench, do_not_optimize } from 'mitata';
import * as p from 'polycodec';

import { specs } from './_specs.ts';

for (const spec of specs) {
  for (const [description, test] of spec.tests) {
    bench(`codec/decode - ${description}`, () => {
      do_not_optimize(p.parse(spec.codec, p.JsonOps.INSTANCE, test.expected));
    }).gc('inner');
  }
}

await run();

import { run, bench, do_not_optimize } from 'mitata';
import * as p from 'polycodec';

import { specs } from './_specs.ts';

for (const spec of specs) {
  for (const [description, test] of spec.tests) {
    bench(`codec/encode - ${description}`, () => {
      do_not_optimize(p.encodeStart(spec.codec, p.JsonOps.INSTANCE, test.input));
    }).gc('inner');
  }
}

await run();

import { describe, it, expect } from 'vitest';
import {
  DataResult,
  Dynamic,
  JsonOps,
  encodeStart,
  fieldOf,
  int,
  object,
  parse,
  passthrough,
  string,
  toCodec,
} from 'polycodec';

const ops = JsonOps.INSTANCE;

describe('Dynamic', () => {
  it('should read fields by name', () => {
    const dynamic = new Dynamic(ops, { a: 1 });
    const field = DataResult.getOrThrow(dynamic.get('a'));
    expect(DataResult.getOrThrow(field.asNumber())).toBe(1);
    expect(DataResult.message(dynamic.get('b'))).toBe('key missing: b in {"a":1}');
  });

  it('should return updated copies', () => {
    const dynamic = new Dynamic(ops, { a: 1 });
    expect(dynamic.set('b', new Dynamic(ops, 'x')).value).toEqual({ a: 1, b: 'x' });
    expect(dynamic.remove('a').value).toEqual({});
    expect(dynamic.update('a', (value) => value.createNumeric(2)).value).toEqual({ a: 2 });
    expect(dynamic.update('missing', (value) => value.createNumeric(2)).value).toEqual({ a: 1 });
    expect(dynamic.value).toEqual({ a: 1 });
  });

  it('should read lists and records element by element', () => {
    const list = new Dynamic(ops, [1, 2]);
    expect(DataResult.getOrThrow(list.asList((element) => DataResult.getOrThrow(element.asNumber()) * 2))).toEqual([
      2, 4,
    ]);
    const entries = DataResult.getOrThrow(new Dynamic(ops, { a: 'x' }).asMap());
    expect(entries.map(([key, value]) => [key.value, value.value])).toEqual([['a', 'x']]);
  });

  it('should decode with a codec', () => {
    const Named = toCodec(object({ name: fieldOf(string, 'name') }));
    expect(DataResult.getOrThrow(new Dynamic(ops, { name: 'Ada' }).read(Named))).toEqual({ name: 'Ada' });
  });

  it('should convert to other ops', () => {
    const converted = new Dynamic(ops, { a: [1, true] }).convert(JsonOps.COMPRESSED);
    expect(converted.ops).toBe(JsonOps.COMPRESSED);
    expect(converted.value).toEqual({ a: [1, true] });
  });

  it('should compare ops and values', () => {
    expect(new Dynamic(ops, { a: [1] }).equals(new Dynamic(ops, { a: [1] }))).toBe(true);
    expect(new Dynamic(ops, { a: [1] }).equals(new Dynamic(JsonOps.COMPRESSED, { a: [1] }))).toBe(false);
    expect(new Dynamic(ops, 1).equals(new Dynamic(ops, 2))).toBe(false);
  });

  it('should default to the empty node', () => {
    expect(new Dynamic(ops).value).toBeNull();
  });

  it('should render its ops and value', () => {
    expect(new Dynamic(ops, { a: 1 }).toString()).toBe('JSON {"a":1}');
  });
});

describe('passthrough', () => {
  it('should read any node as it is', () => {
    const dynamic = DataResult.getOrThrow(parse(passthrough, ops, { a: [1, 2] }));
    expect(dynamic.ops).toBe(ops);
    expect(dynamic.value).toEqual({ a: [1, 2] });
  });

  it('should write a node as it is', () => {
    expect(DataResult.getOrThrow(encodeStart(passthrough, ops, new Dynamic(ops, { a: 1 })))).toEqual({ a: 1 });
  });

  it('should merge a record into a record prefix', () => {
    const result = passthrough.encode(new Dynamic(ops, { b: 2 }), ops, { a: 1 });
    expect(DataResult.getOrThrow(result)).toEqual({ a: 1, b: 2 });
  });

  it('should leave the prefix alone for an empty node', () => {
    expect(DataResult.getOrThrow(passthrough.encode(new Dynamic(ops), ops, { a: 1 }))).toEqual({ a: 1 });
  });

  it('should carry an unknown part of a record', () => {
    const Envelope = toCodec(object({ version: fieldOf(int, 'version'), payload: fieldOf(passthrough, 'payload') }));
    const json = { version: 2, payload: { kind: 'note', tags: ['a', 'b'] } };
    const envelope = DataResult.getOrThrow(parse(Envelope, ops, json));
    expect(envelope.payload.value).toEqual({ kind: 'note', tags: ['a', 'b'] });
    expect(DataResult.getOrThrow(encodeStart(Envelope, JsonOps.COMPRESSED, envelope))).toEqual([
      2,
      { kind: 'note', tags: ['a', 'b'] },
    ]);
  });
});

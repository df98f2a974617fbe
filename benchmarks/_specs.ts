import * as p from 'polycodec';

interface Spec<T = unknown> {
  description: string;
  codec: p.Codec<T>;
  tests: Array<[description: string, test: { input: T; expected: p.JsonValue }]>;
}

export function spec<T>(description: string, codec: p.Codec<T>, inputs: [string, T][]): Spec<T> {
  return {
    description,
    codec,
    tests: inputs.map(([description, input]) => [
      description,
      { input, expected: p.getOrThrow(p.encodeStart(codec, p.JsonOps.INSTANCE, input)) },
    ]),
  };
}

const Address = p.toCodec(
  p.object({
    street: p.fieldOf(p.string, 'street'),
    city: p.fieldOf(p.string, 'city'),
    zipCode: p.fieldOf(p.string, 'zipCode'),
    country: p.fieldOf(p.string, 'country'),
  })
);

const Item = p.toCodec(
  p.object({
    productId: p.fieldOf(p.long, 'productId'),
    name: p.fieldOf(p.string, 'name'),
    quantity: p.fieldOf(p.intRange(1, 1000), 'quantity'),
    unitPrice: p.fieldOf(p.double, 'unitPrice'),
    discount: p.optionalFieldOf(p.double, 'discount'),
  })
);

type Shape = { kind: 'circle'; radius: number } | { kind: 'rect'; width: number; height: number };

const SHAPE_CODECS = new Map<string, p.MapCodec<Shape>>([
  [
    'circle',
    p.mapCodecXmap(
      p.object({ radius: p.fieldOf(p.double, 'radius') }),
      ({ radius }): Shape => ({ kind: 'circle', radius }),
      (shape) => ({ radius: shape.kind === 'circle' ? shape.radius : 0 })
    ),
  ],
  [
    'rect',
    p.mapCodecXmap(
      p.object({ width: p.fieldOf(p.double, 'width'), height: p.fieldOf(p.double, 'height') }),
      ({ width, height }): Shape => ({ kind: 'rect', width, height }),
      (shape) => (shape.kind === 'rect' ? { width: shape.width, height: shape.height } : { width: 0, height: 0 })
    ),
  ],
]);

type Tree = { value: number; children: Tree[] };

const TreeCodec = p.recursive<Tree>('Tree', (self) =>
  p.toCodec(
    p.object({
      value: p.fieldOf(p.int, 'value'),
      children: p.fieldOf(p.listOf(self), 'children'),
    })
  )
);

function tree(depth: number, fanout: number): Tree {
  return {
    value: depth,
    children: depth === 0 ? [] : Array.from({ length: fanout }, () => tree(depth - 1, fanout)),
  };
}

export const specs: Spec[] = [
  spec('2D point', p.toCodec(p.object({ x: p.fieldOf(p.double, 'x'), y: p.fieldOf(p.double, 'y') })), [
    ['Simple 2D point', { x: 42.5, y: -17.25 }],
  ]),

  spec(
    'User profile',
    p.toCodec(
      p.object({
        id: p.fieldOf(p.long, 'id'),
        username: p.fieldOf(p.string, 'username'),
        age: p.fieldOf(p.byte, 'age'),
        verified: p.fieldOf(p.bool, 'verified'),
        bio: p.optionalFieldOf(p.string, 'bio'),
        followers: p.optionalFieldOf(p.int, 'followers', 0),
      })
    ),
    [
      [
        'User profile',
        {
          id: 12345678901234n,
          username: 'user-1',
          age: 28,
          verified: true,
          bio: 'Writes codecs for a living.',
          followers: 1523,
        },
      ],
    ],
  ),

  spec(
    'Order',
    p.toCodec(
      p.object({
        orderId: p.fieldOf(p.long, 'orderId'),
        items: p.fieldOf(p.listOf(Item), 'items'),
        shippingAddress: p.fieldOf(Address, 'shippingAddress'),
        billingAddress: p.optionalFieldOf(Address, 'billingAddress'),
        status: p.fieldOf(p.string, 'status'),
      })
    ),
    [
      [
        'Order (small)',
        {
          orderId: 1001n,
          items: [
            { productId: 101n, name: 'Mouse', quantity: 1, unitPrice: 29.99, discount: undefined },
            { productId: 102n, name: 'Cable', quantity: 2, unitPrice: 12.99, discount: 0.1 },
          ],
          shippingAddress: { street: '1 Test Street', city: 'Testville', zipCode: '00001', country: 'Nowhere' },
          billingAddress: undefined,
          status: 'processing',
        },
      ],
      [
        'Order (large)',
        {
          orderId: 1002n,
          items: Array.from({ length: 50 }, (_, i) => ({
            productId: BigInt(1000 + i),
            name: `Product ${i + 1} with a longer description`,
            quantity: (i % 10) + 1,
            unitPrice: i * 1.5,
            discount: i % 3 === 0 ? 0.15 : undefined,
          })),
          shippingAddress: { street: '2 Test Avenue', city: 'Testville', zipCode: '00002', country: 'Nowhere' },
          billingAddress: { street: '3 Test Plaza', city: 'Testville', zipCode: '00003', country: 'Nowhere' },
          status: 'shipped',
        },
      ],
    ]
  ),

  spec(
    'Shape',
    p.dispatch(p.string, 'type', (shape: Shape) => shape.kind, (kind) => SHAPE_CODECS.get(kind)),
    [
      ['Shape->circle', { kind: 'circle', radius: 5 }],
      ['Shape->rect', { kind: 'rect', width: 10, height: 20 }],
    ]
  ),

  spec('Tree', TreeCodec, [['Tree (depth 4, fanout 3)', tree(4, 3)]]),

  spec('Scores', p.unboundedMap(p.string, p.int), [
    ['Scores (100 entries)', new Map(Array.from({ length: 100 }, (_, i) => [`player-${i}`, i * 7]))],
  ]),
];

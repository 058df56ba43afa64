/**
 * Curve descriptors — how a tool call names a function.
 *
 * Functions cannot cross the protocol, so tools take a small JSON
 * description instead and build the closure here:
 *
 *   { "kind": "squircle", "radius": 1, "exponent": 4 }
 *   { "kind": "table", "points": [[0, 0], [1, 2], [2, 0]] }
 */

import { z } from 'zod';
import {
  constant, circle, squircle, parabola, sine, lookupTable,
  type CurveFunction,
} from '@function-mesh/kernel';

const finite = () => z.number().finite();

export const curveSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('constant'),
    value: finite().default(1).describe('f(x) = value'),
  }),
  z.object({
    kind: z.literal('circle'),
    radius: z.number().positive().default(1).describe('Upper half circle radius'),
  }),
  z.object({
    kind: z.literal('squircle'),
    radius: z.number().positive().default(1).describe('Superellipse radius'),
    exponent: z.number().positive().default(4).describe('2 = circle, 4 = squircle, larger = boxier'),
  }),
  z.object({
    kind: z.literal('parabola'),
    a: finite().default(-1).describe('f(x) = a·x² + c'),
    c: finite().default(1),
  }),
  z.object({
    kind: z.literal('sine'),
    amplitude: finite().default(0.25),
    frequency: finite().default(Math.PI),
    offset: finite().default(1).describe('f(x) = offset + amplitude·sin(frequency·x)'),
  }),
  z.object({
    kind: z.literal('table'),
    points: z.array(z.tuple([finite(), finite()])).min(2).max(10000)
      .describe('[x, y] pairs, x strictly ascending; linear in between, clamped outside'),
  }),
]);

export type CurveDescriptor = z.infer<typeof curveSchema>;

export function toCurveFunction(curve: CurveDescriptor): CurveFunction {
  switch (curve.kind) {
    case 'constant': return constant(curve.value);
    case 'circle': return circle(curve.radius);
    case 'squircle': return squircle(curve.radius, curve.exponent);
    case 'parabola': return parabola(curve.a, curve.c);
    case 'sine': return sine(curve.amplitude, curve.frequency, curve.offset);
    case 'table': return lookupTable(curve.points);
  }
}

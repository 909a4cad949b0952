import { SlotPool } from '../src/slot-pool.js';

export interface Color {
  r: number;
  g: number;
  b: number;
}

export type ColorArgs = [r: number, g: number, b: number];

/** Default color is white. */
export function color(...args: ColorArgs | []): Color {
  if (args.length === 0) return { r: 255, g: 255, b: 255 };
  return { r: args[0], g: args[1], b: args[2] };
}

export function resetColor(target: Color, ...args: ColorArgs | []): void {
  if (args.length === 0) {
    target.r = 255;
    target.g = 255;
    target.b = 255;
  } else {
    target.r = args[0];
    target.g = args[1];
    target.b = args[2];
  }
}

export function colorPool(capacity: number, ...args: ColorArgs | []): SlotPool<Color, ColorArgs> {
  return new SlotPool<Color, ColorArgs>(capacity, color, ...args);
}

/** Activate `count` slots through `useNext()` and return their indices. */
export function fill<T, A extends unknown[]>(pool: SlotPool<T, A>, count: number): number[] {
  const indices: number[] = [];
  for (let i = 0; i < count; i++) {
    const result = pool.useNext();
    if (!result.ok) throw new Error(`fill: useNext failed with ${result.error}`);
    indices.push(result.value.index);
  }
  return indices;
}

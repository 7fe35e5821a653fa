import { ParticleLayout, type TParticleLayout } from "@shared/bond-physics";

const C4_RING_BONDS: Array<[number, number]> = [
  [0, 1],
  [1, 2],
  [2, 3],
  [3, 0],
];

const square = (side: number): Array<[number, number]> => [
  [0, 0],
  [side, 0],
  [side, side],
  [0, side],
];

export const PARTICLE_LAYOUTS: Readonly<Record<string, TParticleLayout>> = Object.freeze({
  "c4-square": ParticleLayout.parse({
    name: "c4-square",
    description: "Carbon ring (C4) placed at the ideal bond length",
    positions: square(1),
    bonds: C4_RING_BONDS,
    probeBond: [0, 1],
  }),
  "c4-compressed": ParticleLayout.parse({
    name: "c4-compressed",
    description: "Carbon ring (C4) starting at half the ideal bond length, visually overlapped",
    positions: square(0.5),
    bonds: C4_RING_BONDS,
    probeBond: [0, 1],
  }),
  "c4-stretched": ParticleLayout.parse({
    name: "c4-stretched",
    description: "Carbon ring (C4) starting at one and a half ideal bond lengths",
    positions: square(1.5),
    bonds: C4_RING_BONDS,
    probeBond: [0, 1],
  }),
});

export const DEFAULT_LAYOUT_NAME = "c4-square";

export class UnknownLayoutError extends Error {
  constructor(public readonly layoutName: string) {
    super(
      `Unknown particle layout "${layoutName}" (expected one of: ${Object.keys(PARTICLE_LAYOUTS).join(", ")})`,
    );
    this.name = "UnknownLayoutError";
  }
}

export function resolveLayout(name: string): TParticleLayout {
  if (!Object.hasOwn(PARTICLE_LAYOUTS, name)) {
    throw new UnknownLayoutError(name);
  }
  return PARTICLE_LAYOUTS[name];
}

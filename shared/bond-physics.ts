import { z } from "zod";

/**
 * Bond force model constants, as published by the bonding engine.
 *
 * Lengths are render-space pixels, time is seconds. `breakStress` does not enter
 * the force computation; it is the strain above which the engine snaps a bond.
 */
export const PhysicsConstants = z
  .object({
    springStiffness: z.number().positive().default(8.0),
    damping: z.number().nonnegative().default(0.92),
    idealLength: z.number().positive().default(42.0),
    breakStress: z.number().positive().default(180.0),
    timestep: z.number().positive().default(1.0 / 60.0),
    mass: z.number().positive().default(12.0),
    velocityDecay: z.number().min(0).max(1).default(0.95),
    vdwRadius: z.number().positive().default(1.7),
    baseRenderRadius: z.number().positive().default(7.0),
    renderScale: z.number().positive().default(1.0),
  })
  .strict();

export type TPhysicsConstants = z.infer<typeof PhysicsConstants>;

export const DEFAULT_PHYSICS_CONSTANTS: TPhysicsConstants = Object.freeze(
  PhysicsConstants.parse({}),
);

export type Vec2 = {
  x: number;
  y: number;
};

export type Particle = {
  id: number;
  position: Vec2;
  velocity: Vec2;
  force: Vec2;
};

export type BondSpec = readonly [particleIdA: number, particleIdB: number];

const LayoutPoint = z.tuple([z.number(), z.number()]);
const LayoutBond = z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]);

export const ParticleLayout = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    // Multiples of the ideal bond length.
    positions: z.array(LayoutPoint).min(2),
    bonds: z.array(LayoutBond).min(1),
    probeBond: LayoutBond,
  })
  .superRefine((layout, ctx) => {
    const count = layout.positions.length;
    const outOfRange = (bond: [number, number]) => bond[0] >= count || bond[1] >= count;
    layout.bonds.forEach((bond, index) => {
      if (outOfRange(bond)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["bonds", index],
          message: `bond ${bond[0]}-${bond[1]} references a particle outside 0..${count - 1}`,
        });
      }
    });
    if (outOfRange(layout.probeBond)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["probeBond"],
        message: "probe bond references a particle outside the layout",
      });
    }
  });

export type TParticleLayout = z.infer<typeof ParticleLayout>;

export type GapVerdict = "PASS" | "WARN" | "FAIL";

export type ParticleGeometry = {
  radius: number;
  diameter: number;
};

export type PhysicsDiagnosticReport = {
  layout: string;
  steps: number;
  constants: TPhysicsConstants;
  targetDistance: number;
  particleRadius: number;
  particleDiameter: number;
  collisionThreshold: number;
  probeBond: [number, number];
  finalBondLength: number;
  finalGap: number;
  minGap: number;
  minGapStep: number;
  maxStrain: number;
  overstressed: boolean;
  skippedForceApplications: number;
  finalPositions: Array<{ id: number } & Vec2>;
  verdict: GapVerdict;
};

import { z } from "zod";
import {
  DEFAULT_PHYSICS_CONSTANTS,
  ParticleLayout,
  type BondSpec,
  type Particle,
  type PhysicsDiagnosticReport,
  type TParticleLayout,
  type TPhysicsConstants,
} from "@shared/bond-physics";
import { solveBondForce } from "./bond-force";
import { classifyGap, computeParticleGeometry } from "./geometry-verifier";
import { integrateParticles } from "./integrator";
import { DEFAULT_LAYOUT_NAME, resolveLayout } from "./layouts";
import { createParticles, distanceBetween } from "./particle";

export const DEFAULT_DIAGNOSTIC_STEPS = 300;

export const DiagnosticSteps = z.number().int().min(1).max(1_000_000);

export type PhysicsDiagnosticOptions = {
  layout?: string | TParticleLayout;
  steps?: number;
};

export type SimulationStepStats = {
  maxStrain: number;
  skipped: number;
};

/**
 * One fixed step: every bond force is accumulated before any particle moves.
 */
export function stepSimulation(
  particles: Particle[],
  bonds: ReadonlyArray<BondSpec>,
  constants: TPhysicsConstants,
): SimulationStepStats {
  let maxStrain = 0;
  let skipped = 0;
  for (const [i, j] of bonds) {
    const result = solveBondForce(particles[i], particles[j], constants);
    if (!result.applied) {
      skipped += 1;
      continue;
    }
    maxStrain = Math.max(maxStrain, result.strain);
  }
  integrateParticles(particles, constants);
  return { maxStrain, skipped };
}

export function runPhysicsDiagnostic(
  constants: TPhysicsConstants = DEFAULT_PHYSICS_CONSTANTS,
  options: PhysicsDiagnosticOptions = {},
): PhysicsDiagnosticReport {
  const layout =
    typeof options.layout === "object"
      ? ParticleLayout.parse(options.layout)
      : resolveLayout(options.layout ?? DEFAULT_LAYOUT_NAME);
  const steps = DiagnosticSteps.parse(options.steps ?? DEFAULT_DIAGNOSTIC_STEPS);
  const geometry = computeParticleGeometry(constants);
  const particles = createParticles(layout, constants);
  const [probeA, probeB] = layout.probeBond;

  let minGap = Number.POSITIVE_INFINITY;
  let minGapStep = 0;
  let maxStrain = 0;
  let skippedForceApplications = 0;

  for (let step = 1; step <= steps; step += 1) {
    const stats = stepSimulation(particles, layout.bonds, constants);
    maxStrain = Math.max(maxStrain, stats.maxStrain);
    skippedForceApplications += stats.skipped;

    const gap = distanceBetween(particles[probeA], particles[probeB]) - geometry.diameter;
    if (gap < minGap) {
      minGap = gap;
      minGapStep = step;
    }
  }

  const finalBondLength = distanceBetween(particles[probeA], particles[probeB]);
  const finalGap = finalBondLength - geometry.diameter;

  return {
    layout: layout.name,
    steps,
    constants,
    targetDistance: constants.idealLength,
    particleRadius: geometry.radius,
    particleDiameter: geometry.diameter,
    collisionThreshold: geometry.diameter,
    probeBond: [probeA, probeB],
    finalBondLength,
    finalGap,
    minGap,
    minGapStep,
    maxStrain,
    overstressed: maxStrain > constants.breakStress,
    skippedForceApplications,
    finalPositions: particles.map((particle) => ({
      id: particle.id,
      x: particle.position.x,
      y: particle.position.y,
    })),
    verdict: classifyGap(finalGap),
  };
}

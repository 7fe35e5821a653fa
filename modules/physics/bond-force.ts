import type { Particle, TPhysicsConstants, Vec2 } from "@shared/bond-physics";
import { applyForce } from "./particle";

export type BondForceResult =
  | { applied: false; reason: "coincident" }
  | { applied: true; distance: number; strain: number; force: Vec2 };

type BondForceConstants = Pick<TPhysicsConstants, "springStiffness" | "damping" | "idealLength">;

/**
 * Spring-damper force for one bond, accumulated into both particles.
 *
 * The force acts along the bond axis only: a Hookean term on the stretch and a
 * damping term on the relative velocity projected onto the axis. `a` receives
 * `+force` (toward `b` when stretched) and `b` receives `-force`.
 * Coincident particles have no axis; nothing is applied.
 */
export function solveBondForce(
  a: Particle,
  b: Particle,
  constants: BondForceConstants,
): BondForceResult {
  const dx = b.position.x - a.position.x;
  const dy = b.position.y - a.position.y;
  const distance = Math.sqrt(dx * dx + dy * dy);
  if (distance === 0) {
    return { applied: false, reason: "coincident" };
  }

  const nx = dx / distance;
  const ny = dy / distance;

  const spring = (distance - constants.idealLength) * constants.springStiffness;

  const rvx = b.velocity.x - a.velocity.x;
  const rvy = b.velocity.y - a.velocity.y;
  const damp = (rvx * nx + rvy * ny) * constants.damping;

  const force = { x: nx * (spring + damp), y: ny * (spring + damp) };
  applyForce(a, force.x, force.y);
  applyForce(b, -force.x, -force.y);

  return {
    applied: true,
    distance,
    strain: Math.abs(distance - constants.idealLength),
    force,
  };
}

import type {
  Particle,
  TParticleLayout,
  TPhysicsConstants,
  Vec2,
} from "@shared/bond-physics";

export const zeroVec = (): Vec2 => ({ x: 0, y: 0 });

export function createParticle(id: number, x: number, y: number): Particle {
  return {
    id,
    position: { x, y },
    velocity: zeroVec(),
    force: zeroVec(),
  };
}

/**
 * Place a layout's particles at multiples of the ideal bond length, at rest.
 */
export function createParticles(
  layout: TParticleLayout,
  constants: Pick<TPhysicsConstants, "idealLength">,
): Particle[] {
  return layout.positions.map(([ux, uy], id) =>
    createParticle(id, ux * constants.idealLength, uy * constants.idealLength),
  );
}

export function distanceBetween(a: Particle, b: Particle): number {
  const dx = b.position.x - a.position.x;
  const dy = b.position.y - a.position.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function applyForce(particle: Particle, fx: number, fy: number): void {
  particle.force.x += fx;
  particle.force.y += fy;
}

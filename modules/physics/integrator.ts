import type { Particle, TPhysicsConstants } from "@shared/bond-physics";

type IntegratorConstants = Pick<TPhysicsConstants, "mass" | "timestep" | "velocityDecay">;

// Semi-implicit Euler: velocity from force, decay, then position from the new velocity.
// The equilibrium distance under test depends on this order.
export function integrateParticle(particle: Particle, constants: IntegratorConstants): void {
  const dt = constants.timestep;
  const ax = particle.force.x / constants.mass;
  const ay = particle.force.y / constants.mass;

  particle.velocity.x += ax * dt;
  particle.velocity.y += ay * dt;
  particle.velocity.x *= constants.velocityDecay;
  particle.velocity.y *= constants.velocityDecay;

  particle.position.x += particle.velocity.x * dt;
  particle.position.y += particle.velocity.y * dt;

  particle.force.x = 0;
  particle.force.y = 0;
}

export function integrateParticles(particles: Particle[], constants: IntegratorConstants): void {
  for (const particle of particles) {
    integrateParticle(particle, constants);
  }
}

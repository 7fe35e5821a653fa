import { describe, expect, it } from "vitest";
import { integrateParticle } from "../modules/physics/integrator";
import { createParticle } from "../modules/physics/particle";

const constants = { mass: 2, timestep: 0.5, velocityDecay: 0.5 };

describe("integrateParticle", () => {
  it("updates velocity, decays it, then moves by the new velocity", () => {
    const particle = createParticle(0, 1, 1);
    particle.velocity = { x: 2, y: 0 };
    particle.force = { x: 4, y: -8 };

    integrateParticle(particle, constants);

    // v = (2 + 4/2 * 0.5) * 0.5 = 1.5 ; vy = (0 - 8/2 * 0.5) * 0.5 = -1
    expect(particle.velocity).toEqual({ x: 1.5, y: -1 });
    expect(particle.position).toEqual({ x: 1.75, y: 0.5 });
  });

  it("clears the force accumulator", () => {
    const particle = createParticle(0, 0, 0);
    particle.force = { x: 3, y: 3 };

    integrateParticle(particle, constants);

    expect(particle.force).toEqual({ x: 0, y: 0 });
  });

  it("applies decay even without force", () => {
    const particle = createParticle(0, 0, 0);
    particle.velocity = { x: 4, y: -4 };

    integrateParticle(particle, constants);
    integrateParticle(particle, constants);

    expect(particle.velocity).toEqual({ x: 1, y: -1 });
    expect(particle.position).toEqual({ x: 1.5, y: -1.5 });
  });
});

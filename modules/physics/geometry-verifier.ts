import type { GapVerdict, ParticleGeometry, TPhysicsConstants } from "@shared/bond-physics";

export const CLEAR_GAP_PX = 5.0;

export const GAP_VERDICT_MESSAGES: Record<GapVerdict, string> = {
  PASS: "VISUALS CLEAR. Particles are separated by a visible bond line.",
  WARN: "VISUALS TIGHT. Particles are barely touching.",
  FAIL: "OVERLAP DETECTED. Particles are clipping!",
};

// Renderer: radius = (vdW radius * base atom radius) * scale.
export function computeParticleGeometry(
  constants: Pick<TPhysicsConstants, "vdwRadius" | "baseRenderRadius" | "renderScale">,
): ParticleGeometry {
  const radius = constants.vdwRadius * constants.baseRenderRadius * constants.renderScale;
  return { radius, diameter: radius * 2 };
}

export function classifyGap(gap: number): GapVerdict {
  if (gap > CLEAR_GAP_PX) return "PASS";
  if (gap > 0) return "WARN";
  return "FAIL";
}

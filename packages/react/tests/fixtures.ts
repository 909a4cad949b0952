export interface Particle {
  life: number;
}

export type ParticleArgs = [life: number];

export function particle(...args: ParticleArgs | []): Particle {
  return { life: args.length === 0 ? 0 : args[0] };
}

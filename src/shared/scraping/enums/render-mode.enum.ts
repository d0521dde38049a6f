export enum RenderMode {
  STATIC = 'static',
  RENDER = 'render',
}

export const RENDER_MODES: readonly string[] = Object.values(RenderMode);

export function isRenderMode(value: unknown): value is RenderMode {
  return typeof value === 'string' && RENDER_MODES.includes(value);
}

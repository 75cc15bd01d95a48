/**
 * Generation model catalog
 */
export interface ResolutionOption {
  label: string;
  value: string;
}

export interface ModelOption {
  name: string;
  ratePerSecond: number; // USD
  resolutions: ResolutionOption[];
}

export const ALLOWED_DURATIONS = [4, 8, 12] as const;
export const DEFAULT_DURATION_SECONDS = 4;

const STANDARD_RESOLUTIONS: ResolutionOption[] = [
  { label: 'Portrait (720x1280)', value: '720x1280' },
  { label: 'Landscape (1280x720)', value: '1280x720' },
];

export const MODEL_OPTIONS: ModelOption[] = [
  {
    name: 'sora-2',
    ratePerSecond: 0.1,
    resolutions: STANDARD_RESOLUTIONS,
  },
  {
    name: 'sora-2-pro',
    ratePerSecond: 0.3,
    resolutions: [
      ...STANDARD_RESOLUTIONS,
      { label: 'Portrait (1024x1792)', value: '1024x1792' },
      { label: 'Landscape (1792x1024)', value: '1792x1024' },
    ],
  },
];

export function estimateCost(model: ModelOption, seconds: number): number {
  return model.ratePerSecond * seconds;
}

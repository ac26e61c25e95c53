export const ProviderKind = {
  SHAREPOINT: 'sharepoint',
  ONEDRIVE: 'onedrive',
} as const;

export type ProviderKind = (typeof ProviderKind)[keyof typeof ProviderKind];

export function isProviderKind(value: string): value is ProviderKind {
  return Object.values<string>(ProviderKind).includes(value);
}

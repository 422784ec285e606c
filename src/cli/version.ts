// Kept in sync with package.json by hand; the binary never reads it at runtime
export const PACKAGE_INFO = {
  name: 'cyclewatch',
  version: '1.0.0',
} as const;

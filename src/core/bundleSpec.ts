export const BUNDLE_TYPES = ["gzip-v2", "zstd", "zstd-max", "packed1"] as const;

export type BundleType = (typeof BUNDLE_TYPES)[number];

export interface BundleSpec {
  type: BundleType;
  /** Arguments handed to the VCS tool ahead of the output path. */
  generationArgs: readonly string[];
  /** Position in the client manifest; lower is preferred. */
  priority: number;
  /** Value of the BUNDLESPEC= parameter advertised to clients. */
  bundlespec: string;
}

// Listed in generation order. zstd-max uses level 20 (and not higher) because
// that is the largest level the zstd library supports in 32-bit processes.
const BUILTIN_SPECS: BundleSpec[] = [
  { type: "gzip-v2", generationArgs: ["bundle", "-a", "-t", "gzip-v2"], priority: 2, bundlespec: "gzip-v2" },
  { type: "zstd", generationArgs: ["bundle", "-a", "-t", "zstd-v2"], priority: 1, bundlespec: "zstd-v2" },
  {
    type: "zstd-max",
    generationArgs: ["--config", "experimental.bundlecomplevel=20", "bundle", "-a", "-t", "zstd-v2"],
    priority: 0,
    bundlespec: "zstd-v2"
  },
  {
    type: "packed1",
    generationArgs: ["debugcreatestreamclonebundle"],
    priority: 3,
    bundlespec: "none-packed1;requirements%3Dgeneraldelta%2Crevlogv1"
  }
];

export const DEFAULT_BUNDLE_SPECS: readonly BundleSpec[] = Object.freeze(
  BUILTIN_SPECS.map((spec) => Object.freeze({ ...spec, generationArgs: Object.freeze([...spec.generationArgs]) }))
);

export function isBundleType(value: string): value is BundleType {
  return BUNDLE_TYPES.some((t) => t === value);
}

/** zstd and zstd-max are redundant, so exactly one of them is produced. */
export function selectBundleSpecs(specs: readonly BundleSpec[], useMaxCompression: boolean): BundleSpec[] {
  return specs.filter((spec) => {
    if (spec.type === "zstd") return !useMaxCompression;
    if (spec.type === "zstd-max") return useMaxCompression;
    return true;
  });
}

export function byPriority(specs: readonly BundleSpec[]): BundleSpec[] {
  return specs.slice().sort((a, b) => a.priority - b.priority);
}

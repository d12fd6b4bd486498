import path from "path";
import { OPENAPI_VERSION, resourceSegment, type RenderedDocument } from "./openapi-renderer";

export type BundleEntry = {
  sourcePath: string; // relative to the input root
  method: string;
  document: RenderedDocument;
};

export type ApiType = "data" | "calls";

export type Bundle = {
  name: string; // output file stem
  domain: string;
  apiType: ApiType;
  document: RenderedDocument;
  methods: string[];
  warnings: string[];
};

const API_TYPES: readonly string[] = ["data", "calls"];

function directories(sourcePath: string): string[] {
  return sourcePath.split(/[\\/]+/).filter(Boolean).slice(0, -1);
}

/**
 * `calls/...` pages belong to the calls API, everything else to the data API.
 */
export function apiTypeOf(entry: Pick<BundleEntry, "sourcePath">): ApiType {
  return directories(entry.sourcePath)[0] === "calls" ? "calls" : "data";
}

/**
 * The first directory of the source path below an optional `data/` or
 * `calls/` tree, else the method's resource segment.
 */
export function domainOf(
  entry: Pick<BundleEntry, "sourcePath" | "method">,
  mappings: Record<string, string> = {},
): string {
  const dirs = directories(entry.sourcePath);
  const domainDirs = API_TYPES.includes(dirs[0] ?? "") ? dirs.slice(1) : dirs;
  const domain = domainDirs[0] || resourceSegment(entry.method) || "unknown";
  return mappings[domain] ?? domain;
}

type BundleGroup = {
  domain: string;
  apiType: ApiType;
  entries: BundleEntry[];
};

function displayName(domain: string): string {
  return domain
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map(word => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Merge per-method documents into one OpenAPI document per domain, keeping
 * the calls API apart from the data API.
 * The first document to claim a path keeps it.
 */
export function bundleByDomain(
  entries: readonly BundleEntry[],
  mappings: Record<string, string> = {},
): Bundle[] {
  const groups = new Map<string, BundleGroup>();
  for (const entry of entries) {
    const domain = domainOf(entry, mappings);
    const apiType = apiTypeOf(entry);
    const name = apiType === "calls" ? `${domain}_calls` : domain;
    const group = groups.get(name) ?? { domain, apiType, entries: [] };
    group.entries.push(entry);
    groups.set(name, group);
  }

  const names = [...groups.keys()].sort();
  return names.flatMap(name => {
    const group = groups.get(name);
    return group ? [createBundle(name, group)] : [];
  });
}

function createBundle(
  name: string,
  { domain, apiType, entries }: BundleGroup,
): Bundle {
  const label = displayName(domain) + (apiType === "calls" ? " Calls" : "");
  const bundle: Bundle = {
    name,
    domain,
    apiType,
    methods: [],
    warnings: [],
    document: {
      openapi: OPENAPI_VERSION,
      info: {
        title: `${label} API`,
        version: "1.0.0",
        description: `Combined ${label} API specifications`,
      },
      paths: {},
    },
  };

  for (const entry of entries) {
    mergeInto(bundle, entry);
  }

  return bundle;
}

function mergeInto(bundle: Bundle, entry: BundleEntry): void {
  const { document } = bundle;
  bundle.methods.push(entry.method);

  for (const [route, item] of Object.entries(entry.document.paths)) {
    if (document.paths[route]) {
      bundle.warnings.push(
        `Path ${route} from ${path.normalize(entry.sourcePath)} already present in ${bundle.name}, keeping the first`,
      );
      continue;
    }
    document.paths[route] = item;
  }

  const errors = entry.document["x-errors"];
  if (errors?.length) {
    document["x-errors"] = [...(document["x-errors"] ?? []), ...errors];
  }
}

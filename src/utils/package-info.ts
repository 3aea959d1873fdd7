import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const PackageJsonSchema = z.object({
  version: z.string().catch("dev"),
  gitCc: z
    .object({
      commit: z.string().catch("none"),
      date: z.string().catch("unknown"),
    })
    .catch({ commit: "none", date: "unknown" }),
});

export type PackageInfo = z.infer<typeof PackageJsonSchema>;

const FALLBACK_INFO: PackageInfo = {
  version: "dev",
  gitCc: { commit: "none", date: "unknown" },
};

// src/ and dist/ both sit directly below the package root
export const readPackageInfo = (
  packageJsonPath: string = join(dirname(fileURLToPath(import.meta.url)), "../../package.json")
): PackageInfo => {
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, "utf-8")));
    return parsed.success ? parsed.data : FALLBACK_INFO;
  } catch {
    return FALLBACK_INFO;
  }
};

export const formatVersion = (info: PackageInfo): string =>
  `version: ${info.version}, commit: ${info.gitCc.commit}, built at ${info.gitCc.date}`;

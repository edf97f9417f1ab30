import type { NextConfig } from "next";
import { resolve } from "path";
import { loadEnvConfig } from "@next/env";

// Env files live at the repo root, shared by every workspace. The app reads
// NEXT_PUBLIC_LOG_LEVEL, NEXT_PUBLIC_DEBUG_HUD and NEXT_PUBLIC_TAG_COLOURS.
const rootDir = resolve(process.cwd(), "../../");
loadEnvConfig(rootDir);

const nextConfig: NextConfig = {
  reactStrictMode: true,
  // The shared package ships TypeScript sources
  transpilePackages: ["@strata/shared"],
};

export default nextConfig;

import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // sharp is a native module; load it from node_modules instead of bundling it
  // into the route handlers.
  serverExternalPackages: ["sharp"]
};

export default nextConfig;

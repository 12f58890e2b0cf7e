import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // pino spawns worker threads; keep it out of the server bundle
  serverExternalPackages: ['pino', 'thread-stream'],
};

export default nextConfig;

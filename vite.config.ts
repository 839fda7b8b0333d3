import { defineConfig } from "vite";

export default defineConfig({
  // Scene files under public/scenes are served as /scenes/*.json
  publicDir: "public",
  build: {
    target: "es2022",
  },
  server: {
    open: true,
    port: 5199,
    strictPort: true,    // The viewer URL is bookmarked with ?scene= params; don't drift ports
  },
});

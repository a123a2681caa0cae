import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (rel: string): string => fileURLToPath(new URL(`./packages/${rel}`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^@blockpaint\/core$/, replacement: pkg("core/src/index.ts") },
			{ find: /^@blockpaint\/ui\/ansi$/, replacement: pkg("ui/src/ansi.ts") },
			{ find: /^@blockpaint\/ui$/, replacement: pkg("ui/src/index.ts") },
			{ find: /^@blockpaint\/raster$/, replacement: pkg("raster/src/index.ts") },
			{ find: /^@blockpaint\/cli$/, replacement: pkg("cli/src/index.ts") },
		],
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		environment: "node",
		pool: "forks",
	},
});

import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		index: "src/index.ts",
		"cli/prover": "src/cli/prover.ts",
		"cli/verifier": "src/cli/verifier.ts",
	},
	// @noble/* v2 ships ESM only
	format: ["esm"],
	dts: { entry: "src/index.ts" },
	sourcemap: true,
	clean: true,
	target: "node20",

	// Чтобы вообще не было чанков/внутренних импортов
	splitting: false,

	platform: "node",
});

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		projects: [
			{
				test: {
					name: "unit",
					environment: "node",
					include: ["test/**/*.unit.{test,spec}.ts"],
				},
			},
			{
				test: {
					name: "integration",
					environment: "node",
					include: ["test/**/*.integration.{test,spec}.ts"],
				},
			},
		],
	},
});

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Get the current version from package.json
 */
export function getVersion(): string {
	try {
		// Both src/utils and dist/utils sit two levels below the project root
		const currentDir = dirname(fileURLToPath(import.meta.url));
		const packageJsonPath = join(currentDir, "../../package.json");
		const packageJson = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
		return packageJson.version || "unknown";
	} catch (error) {
		console.error("Warning: Could not read version from package.json:", error);
		return "unknown";
	}
}

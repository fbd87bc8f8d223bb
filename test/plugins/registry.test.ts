import { describe, expect, it } from "vitest";
import { ProviderPlugin } from "../../src/plugins/plugin.js";
import { PluginRegistry, isProviderClass, missingProviderMembers } from "../../src/plugins/registry.js";
import { openrouterPlugin } from "../../src/providers/openrouter.js";
import type { ProviderClass } from "../../src/types.js";
import { FakeProvider, FieldOnlyProvider, fakeMetadata, fakePlugin } from "../fakes.js";

/** Registry whose package lookup only knows the names given. */
function registryWith(installed: string[] = []): PluginRegistry {
	return new PluginRegistry({ isDependencyInstalled: (name) => installed.includes(name) });
}

describe("PluginRegistry", () => {
	describe("registerPlugin / unregisterPlugin", () => {
		it("registers a plugin under a unique name", () => {
			const registry = registryWith();
			const plugin = fakePlugin();

			expect(registry.registerPlugin("fake", plugin)).toBe(true);
			expect(registry.getPlugin("fake")).toBe(plugin);
			expect(registry.isRegistered("fake")).toBe(true);
			expect(registry.count()).toBe(1);
		});

		it("rejects a duplicate name and keeps the first plugin", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin({ description: "first" }));

			expect(registry.registerPlugin("fake", fakePlugin({ description: "second" }))).toBe(false);
			expect(registry.getPlugin("fake")?.description).toBe("first");
			expect(registry.count()).toBe(1);
		});

		it("unregisters only what is present", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin());

			expect(registry.unregisterPlugin("fake")).toBe(true);
			expect(registry.unregisterPlugin("fake")).toBe(false);
			expect(registry.getPlugin("fake")).toBeUndefined();
		});

		it("count tracks registrations minus removals", () => {
			const registry = registryWith();
			for (const name of ["a", "b", "c", "d"]) {
				registry.registerPlugin(name, fakePlugin());
			}
			registry.unregisterPlugin("b");
			registry.unregisterPlugin("missing");
			registry.registerPlugin("a", fakePlugin());

			expect(registry.count()).toBe(3);
			expect(registry.getPluginNames()).toEqual(["a", "c", "d"]);
		});

		it("replacePlugin swaps only existing entries", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin({ version: "1.0.0" }));

			expect(registry.replacePlugin("fake", fakePlugin({ version: "2.0.0" }))).toBe(true);
			expect(registry.getPlugin("fake")?.version).toBe("2.0.0");
			expect(registry.replacePlugin("other", fakePlugin())).toBe(false);
			expect(registry.isRegistered("other")).toBe(false);
		});

		it("clear removes everything", () => {
			const registry = registryWith();
			registry.registerPlugin("a", fakePlugin());
			registry.registerPlugin("b", fakePlugin());

			registry.clear();

			expect(registry.count()).toBe(0);
			expect(registry.getPluginNames()).toEqual([]);
		});
	});

	describe("lookups", () => {
		it("getAllPlugins returns a copy", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin());

			const all = registry.getAllPlugins();
			all.delete("fake");

			expect(registry.isRegistered("fake")).toBe(true);
		});

		it("finds plugins by provider class name", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin());
			registry.registerPlugin("openrouter", openrouterPlugin);

			expect(registry.findByProviderClass("FakeProvider")).toEqual(["fake"]);
			expect(registry.findByProviderClass("OpenRouterProvider")).toEqual(["openrouter"]);
			expect(registry.findByProviderClass("Nope")).toEqual([]);
		});

		it("matches scalar and list metadata fields", () => {
			const registry = registryWith();
			registry.registerPlugin("a", fakePlugin({ category: "community", supportedFeatures: ["streaming"] }));
			registry.registerPlugin("b", fakePlugin({ category: "custom", supportedFeatures: ["chat_completion"] }));

			expect(registry.getPluginsByMetadata("category", "community")).toEqual(["a"]);
			expect(registry.getPluginsByMetadata("supportedFeatures", "chat_completion")).toEqual(["b"]);
			expect(registry.getPluginsByMetadata("author", "tests")).toEqual(["a", "b"]);
		});
	});

	describe("dependencies", () => {
		it("reports each dependency as registered plugin or installed package", () => {
			const registry = registryWith(["left-pad"]);
			registry.registerPlugin("base", fakePlugin());
			registry.registerPlugin("child", fakePlugin({ requires: ["base", "left-pad", "missing-pkg"] }));

			expect(registry.getPluginDependencies("child")).toEqual(["base", "left-pad", "missing-pkg"]);
			expect(registry.checkDependencies("child")).toEqual({
				base: true,
				"left-pad": true,
				"missing-pkg": false,
			});
		});

		it("returns nothing for unknown plugins", () => {
			const registry = registryWith();
			expect(registry.getPluginDependencies("ghost")).toEqual([]);
			expect(registry.checkDependencies("ghost")).toEqual({});
		});

		it("lists dependents", () => {
			const registry = registryWith();
			registry.registerPlugin("base", fakePlugin());
			registry.registerPlugin("x", fakePlugin({ requires: ["base"] }));
			registry.registerPlugin("y", fakePlugin({ requires: [] }));

			expect(registry.getDependentPlugins("base")).toEqual(["x"]);
		});

		it("resolves real packages by default", () => {
			const registry = new PluginRegistry();
			registry.registerPlugin("p", fakePlugin({ requires: ["zod", "definitely-not-installed-pkg"] }));

			expect(registry.checkDependencies("p")).toEqual({
				zod: true,
				"definitely-not-installed-pkg": false,
			});
		});
	});

	describe("validation", () => {
		it("accepts a complete plugin", () => {
			expect(registryWith().validatePlugin(fakePlugin())).toBe(true);
			expect(registryWith().validatePlugin(openrouterPlugin)).toBe(true);
		});

		it("rejects a class without generateMessage on its prototype", () => {
			const plugin = new ProviderPlugin(FieldOnlyProvider, fakeMetadata());

			expect(missingProviderMembers(FieldOnlyProvider)).toEqual(["generateMessage"]);
			expect(registryWith().validatePlugin(plugin)).toBe(false);
		});

		it("rejects empty required metadata", () => {
			expect(registryWith().validatePlugin(fakePlugin({ author: "" }))).toBe(false);
			expect(registryWith().validatePlugin(fakePlugin({ version: "" }))).toBe(false);
		});

		it("validateRegistry reports without removing", () => {
			const registry = registryWith();
			registry.registerPlugin("good", fakePlugin());
			registry.registerPlugin("bad", new ProviderPlugin(FieldOnlyProvider, fakeMetadata()));

			expect(registry.validateRegistry()).toEqual({ valid: ["good"], invalid: ["bad"] });
			expect(registry.count()).toBe(2);
		});

		it("isProviderClass rejects non-constructors", () => {
			expect(isProviderClass(FakeProvider)).toBe(true);
			expect(isProviderClass({})).toBe(false);
			expect(missingProviderMembers("nope")).toEqual(["constructor"]);
		});
	});

	describe("serialization", () => {
		it("summarizes registered plugins", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin());

			expect(registry.getRegistryInfo()).toEqual({
				totalPlugins: 1,
				pluginNames: ["fake"],
				plugins: {
					fake: {
						providerClass: "FakeProvider",
						version: "1.0.0",
						author: "tests",
						description: "Scripted provider for tests",
					},
				},
			});
		});

		it("exports a deep, JSON-compatible snapshot", () => {
			const registry = registryWith();
			registry.registerPlugin("fake", fakePlugin({ requires: ["base"] }));

			const exported = registry.exportRegistry();
			expect(exported.version).toBe("1.0.0");
			expect(exported.plugins.fake).toEqual({
				providerClassName: "FakeProvider",
				version: "1.0.0",
				author: "tests",
				description: "Scripted provider for tests",
				requires: ["base"],
				metadata: fakeMetadata({ requires: ["base"] }),
			});

			exported.plugins.fake.metadata.requires.push("mutated");
			expect(registry.getPluginDependencies("fake")).toEqual(["base"]);
			expect(JSON.parse(JSON.stringify(exported))).toEqual(exported);
		});

		it("round-trips through export and import", () => {
			const source = registryWith();
			source.registerPlugin("fake", fakePlugin({ description: "fake one" }));
			source.registerPlugin("openrouter", openrouterPlugin);

			const classes: Record<string, ProviderClass> = {
				FakeProvider,
				OpenRouterProvider: openrouterPlugin.providerClass,
			};
			const target = registryWith();
			const imported = target.importRegistry(source.exportRegistry(), (name) => classes[name]);

			expect(imported).toEqual(["fake", "openrouter"]);
			expect(target.getPluginNames()).toEqual(source.getPluginNames());
			expect(target.getPlugin("fake")?.metadata).toEqual(source.getPlugin("fake")?.metadata);
			expect(target.getPlugin("openrouter")?.providerClass).toBe(openrouterPlugin.providerClass);
		});

		it("skips entries whose class cannot be resolved", () => {
			const source = registryWith();
			source.registerPlugin("fake", fakePlugin());

			expect(registryWith().importRegistry(source.exportRegistry(), () => undefined)).toEqual([]);
		});
	});
});

import { describe, expect, it, vi } from "vitest";
import { noopLogger, type RegistryLogger } from "../logger.ts";
import { bootstrapRegistry, type Registrar } from "./bootstrap.ts";
import { defineCapability, type Module } from "./handle.ts";
import type { ModuleRegistration } from "./metadata.ts";

interface Plugin extends Module {
	run(): string;
}

const PluginCapability = defineCapability<Plugin>("plugin");

function plugin(name: string): ModuleRegistration {
	return {
		name,
		moduleType: "plugin",
		factory: () => PluginCapability.wrap({ name, moduleType: "plugin", run: () => `${name} ran` }),
	};
}

// Each test gets its own copy of the module-level state. Error classes come
// from the same fresh module graph so instanceof checks line up.
async function loadGlobal() {
	vi.resetModules();
	const fresh = await import("./global.ts");
	const errors = await import("./errors.ts");
	fresh.setGlobalRegistryLogger(noopLogger);
	return { ...fresh, errors };
}

describe("globalRegistry", () => {
	it("queues submissions until first access", async () => {
		const fresh = await loadGlobal();
		fresh.submitRegistration(plugin("alpha"));
		fresh.submitRegistration(plugin("beta"));

		expect(fresh.globalRegistryState()).toBe("uninitialized");
		expect(fresh.pendingRegistrationCount()).toBe(2);
	});

	it("drains the queue and returns the same instance afterwards", async () => {
		const fresh = await loadGlobal();
		fresh.submitRegistration(plugin("beta"));
		fresh.submitRegistration(plugin("alpha"));

		const first = fresh.globalRegistry();
		const second = fresh.globalRegistry();

		expect(second).toBe(first);
		expect(fresh.globalRegistryState()).toBe("ready");
		expect(fresh.pendingRegistrationCount()).toBe(0);
		expect(first.list()).toEqual(["alpha", "beta"]);
		expect(first.lookup("alpha")?.moduleType).toBe("plugin");
	});

	it("builds an empty registry when nothing was submitted", async () => {
		const fresh = await loadGlobal();

		expect(fresh.globalRegistry().size).toBe(0);
		expect(fresh.globalRegistryState()).toBe("ready");
	});

	it("registers late submissions directly", async () => {
		const fresh = await loadGlobal();
		fresh.submitRegistration(plugin("early"));
		const registry = fresh.globalRegistry();

		fresh.submitRegistration(plugin("late"));

		expect(fresh.pendingRegistrationCount()).toBe(0);
		expect(registry.list()).toEqual(["early", "late"]);
		expect(() => fresh.submitRegistration(plugin("late"))).toThrow(
			fresh.errors.RegistryConflictError,
		);
	});

	it("stays uninitialized with the queue intact when a submission conflicts", async () => {
		const fresh = await loadGlobal();
		fresh.submitRegistration(plugin("alpha"));
		fresh.submitRegistration(plugin("alpha"));

		expect(() => fresh.globalRegistry()).toThrow(fresh.errors.RegistryConflictError);
		expect(fresh.globalRegistryState()).toBe("uninitialized");
		expect(fresh.pendingRegistrationCount()).toBe(2);
		expect(() => fresh.globalRegistry()).toThrow(fresh.errors.RegistryConflictError);
	});

	it("recovers once the conflicting submission is withdrawn", async () => {
		const fresh = await loadGlobal();
		const original = plugin("alpha");
		const duplicate = plugin("alpha");
		fresh.submitRegistration(original);
		fresh.submitRegistration(plugin("beta"));
		fresh.submitRegistration(duplicate);

		expect(() => fresh.globalRegistry()).toThrow(fresh.errors.RegistryConflictError);
		expect(fresh.pendingRegistrations().map((r) => r.name)).toEqual(["alpha", "beta", "alpha"]);

		expect(fresh.withdrawRegistration(duplicate)).toBe(true);
		expect(fresh.withdrawRegistration(duplicate)).toBe(false);

		expect(fresh.globalRegistry().list()).toEqual(["alpha", "beta"]);
		expect(fresh.globalRegistryState()).toBe("ready");
		expect(fresh.withdrawRegistration(original)).toBe(false);
	});

	it("rejects re-entry while the registry is being built", async () => {
		const fresh = await loadGlobal();
		let reentryError: unknown;
		const reentrantLogger: RegistryLogger = {
			...noopLogger,
			debug: () => {
				try {
					fresh.globalRegistry();
				} catch (error) {
					reentryError = error;
				}
			},
		};
		fresh.setGlobalRegistryLogger(reentrantLogger);
		fresh.submitRegistration(plugin("alpha"));

		const registry = fresh.globalRegistry();

		expect(reentryError).toBeInstanceOf(fresh.errors.InternalRegistryError);
		expect(registry.list()).toEqual(["alpha"]);
		expect(fresh.globalRegistryState()).toBe("ready");
	});

	it("logs the module count once ready", async () => {
		const fresh = await loadGlobal();
		const info = vi.fn();
		fresh.setGlobalRegistryLogger({ ...noopLogger, info });
		fresh.submitRegistration(plugin("alpha"));
		fresh.submitRegistration(plugin("beta"));

		fresh.globalRegistry();

		expect(info).toHaveBeenCalledWith("Module registry initialized with 2 modules");
	});
});

describe("bootstrapRegistry", () => {
	it("runs registrars in order against a fresh registry", async () => {
		const calls: string[] = [];
		const registrars: Registrar[] = [
			(registry) => {
				calls.push("first");
				registry.register(plugin("one"));
			},
			(registry) => {
				calls.push(`second saw ${registry.list().join(",")}`);
				registry.register(plugin("two"));
			},
		];

		const registry = bootstrapRegistry(registrars, { logger: noopLogger });

		expect(calls).toEqual(["first", "second saw one"]);
		expect(registry.list()).toEqual(["one", "two"]);
		const two = await registry.createAs("two", PluginCapability);
		expect(two.run()).toBe("two ran");
	});

	it("gives each call its own registry", () => {
		const registrars: Registrar[] = [(registry) => registry.register(plugin("solo"))];

		const a = bootstrapRegistry(registrars, { logger: noopLogger });
		const b = bootstrapRegistry(registrars, { logger: noopLogger });

		expect(a).not.toBe(b);
		expect(b.list()).toEqual(["solo"]);
	});
});

import type { Backend } from "./backend/backend.ts";
import { JsBackend } from "./backend/js.ts";
import { VmBackend } from "./backend/vm.ts";

export const backends = {
  vm: (): Backend => new VmBackend(),
  js: (): Backend => new JsBackend(),
} as const;

export type BackendName = keyof typeof backends;

export interface Options {
  backend: BackendName;
  /**Reject characters that are not operators, letters, digits or spaces */
  strict: boolean;
}

export const defaultOptions: Readonly<Options> = {
  backend: "vm",
  strict: false,
};

export const isBackendName = (name: string): name is BackendName =>
  Object.hasOwn(backends, name);

export const backendNames: BackendName[] = Object.keys(backends).filter(
  isBackendName,
);

export const resolveOptions = (overrides: Partial<Options> = {}): Options => ({
  ...defaultOptions,
  ...overrides,
});

import { fileURLToPath } from "node:url";
import { vi } from "vitest";

export function fixture(name: string): string {
  return fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));
}

export function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export * from './checker.js';
export * from './registry.js';
export * from './run.js';
export { CpuChecker, type CpuSample } from './checkers/cpu.js';
export { MemoryChecker, type MemorySample } from './checkers/memory.js';
export { DiskChecker, type DiskCheckerOptions, type FsStats } from './checkers/disk.js';

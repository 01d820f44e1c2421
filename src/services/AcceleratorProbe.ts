import { commandExists as defaultCommandExists, type CommandExistsFn } from '../os/exec.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';
import type { ComputeDevice, DevicePolicy } from '../types/index.js';

export interface AcceleratorProbe {
  readonly name: string;
  isAvailable(): Promise<boolean>;
}

/** CUDA is usable when the NVIDIA driver tooling is installed. */
export function createCudaProbe(commandExists: CommandExistsFn = defaultCommandExists): AcceleratorProbe {
  return {
    name: 'cuda',
    isAvailable: () => commandExists('nvidia-smi'),
  };
}

export interface DeviceChoice {
  device: ComputeDevice;
  /** A failed accelerated load may retry on the CPU (`auto` only). */
  cpuFallback: boolean;
}

/**
 * - `cpu`: always the CPU
 * - `accelerated`: the accelerator or `E_ACCELERATOR_UNAVAILABLE`, never the CPU
 * - `auto`: the accelerator when present, else the CPU
 */
export async function chooseComputeDevice(policy: DevicePolicy, probe: AcceleratorProbe): Promise<Result<DeviceChoice>> {
  if (policy === 'cpu') return ok({ device: 'cpu', cpuFallback: false });

  const available = await probe.isAvailable();
  if (policy === 'accelerated') {
    if (!available) {
      return err({
        code: APP_ERROR.ACCELERATOR_UNAVAILABLE,
        message: `Accelerated device requested but ${probe.name} is not available`,
      });
    }
    return ok({ device: 'cuda', cpuFallback: false });
  }

  return ok(available ? { device: 'cuda', cpuFallback: true } : { device: 'cpu', cpuFallback: false });
}

/**
 * Codegen Engine - Target Device Registry
 *
 * Hardware profiles the build configuration can target. A device that
 * cannot do native 64-bit integer arithmetic rejects numeric widening.
 */

import type { TargetDeviceProfile } from '../types/index.js';

// ============================================================================
// Profile Helpers
// ============================================================================

const createDeviceProfile = (
  id: string,
  vendor: string,
  family: string,
  displayName: string,
  wordLengths: TargetDeviceProfile['wordLengths'],
  supportsFloatingPoint: boolean
): TargetDeviceProfile => ({
  id,
  vendor,
  family,
  displayName,
  wordLengths,
  supportsNativeInt64: wordLengths.longLong === 64,
  supportsFloatingPoint,
});

const AVR_WORDS = { char: 8, short: 16, int: 16, long: 32 };
const ARM_CORTEX_WORDS = { char: 8, short: 16, int: 32, long: 32, longLong: 64 };

// ============================================================================
// Device Catalog
// ============================================================================

export const TARGET_DEVICES: Record<string, TargetDeviceProfile> = {
  'atmel-avr-atmega328p': createDeviceProfile(
    'atmel-avr-atmega328p',
    'Atmel',
    'AVR',
    'ATmega328P (Arduino Uno)',
    AVR_WORDS,
    false
  ),
  'atmel-avr-atmega2560': createDeviceProfile(
    'atmel-avr-atmega2560',
    'Atmel',
    'AVR',
    'ATmega2560 (Arduino Mega)',
    AVR_WORDS,
    false
  ),
  'arm-cortex-m0plus': createDeviceProfile(
    'arm-cortex-m0plus',
    'ARM Compatible',
    'ARM Cortex-M',
    'Cortex-M0+ (RP2040)',
    ARM_CORTEX_WORDS,
    false
  ),
  'arm-cortex-m4': createDeviceProfile(
    'arm-cortex-m4',
    'ARM Compatible',
    'ARM Cortex-M',
    'Cortex-M4F (STM32F4)',
    ARM_CORTEX_WORDS,
    true
  ),
  'arm-cortex-m7': createDeviceProfile(
    'arm-cortex-m7',
    'ARM Compatible',
    'ARM Cortex-M',
    'Cortex-M7 (STM32H7)',
    ARM_CORTEX_WORDS,
    true
  ),
  'xtensa-esp32': createDeviceProfile(
    'xtensa-esp32',
    'Espressif',
    'Xtensa',
    'ESP32',
    ARM_CORTEX_WORDS,
    true
  ),
  'ti-c2000': createDeviceProfile(
    'ti-c2000',
    'Texas Instruments',
    'C2000',
    'TMS320F28x',
    { char: 16, short: 16, int: 16, long: 32, longLong: 64 },
    true
  ),
  'generic-x86-64': createDeviceProfile(
    'generic-x86-64',
    'Generic',
    'x86-64',
    'x86-64 host (Linux 64)',
    { char: 8, short: 16, int: 32, long: 64, longLong: 64 },
    true
  ),
};

export function getTargetDevice(id: string): TargetDeviceProfile | undefined {
  return Object.hasOwn(TARGET_DEVICES, id) ? TARGET_DEVICES[id] : undefined;
}

export function listTargetDevices(): TargetDeviceProfile[] {
  return Object.values(TARGET_DEVICES).sort((a, b) => a.id.localeCompare(b.id));
}

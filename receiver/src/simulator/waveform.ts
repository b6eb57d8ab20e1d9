import type { Reading } from "@fbg-logger/common";

import type { SlotColumn } from "../state/slot-table";

// Unstrained Bragg wavelengths of the gratings on each fiber [nm]
const BASE_WAVELENGTHS_NM = [1534.63, 1549.65];
const GRATING_SPACING_NM = 15;

// Strain-optic coefficient of the fiber and force sensitivity of the load cell [/N]
const STRAIN_OPTIC_COEFFICIENT = 0.28;
const FORCE_SENSITIVITY_PER_N = 1 / 460 / 0.02986;

/** What the simulator sends as the record value: force [mN] or raw wavelength [nm]. */
export type Quantity = "force" | "wavelength";

export interface WaveformOptions {
	/** Peak wavelength shift [nm]. */
	amplitudeNm: number;
	/** Duration of one load cycle [ms]. */
	cycleMs: number;
	/** Uniform noise bound [nm]. */
	jitterNm: number;
	random?: () => number;
}

export const DEFAULT_WAVEFORM: WaveformOptions = {
	amplitudeNm: 0.25,
	cycleMs: 2000,
	jitterNm: 0.002
};

export function baseWavelength(sensorNumber: number): number {
	const known = BASE_WAVELENGTHS_NM[sensorNumber - 1];
	if (known !== undefined) return known;
	const last = BASE_WAVELENGTHS_NM[BASE_WAVELENGTHS_NM.length - 1];
	return last + GRATING_SPACING_NM * (sensorNumber - BASE_WAVELENGTHS_NM.length);
}

/** Force [mN] on a grating from its shift away from the unloaded wavelength. */
export function calibrateForce(initialNm: number, nm: number): number {
	const strain = (nm - initialNm) / initialNm / (1 - STRAIN_OPTIC_COEFFICIENT);
	return (strain / FORCE_SENSITIVITY_PER_N) * 1000;
}

function jitter(max: number, random: () => number): number {
	return (random() * 2 - 1) * max;
}

/**
 * Synthetic reading for one slot at time `tMs`: a sinusoidal load cycle around
 * the grating's base wavelength, phase-shifted per column so slots differ.
 * With `quantity` "force" the wavelength is converted by `calibrateForce`.
 */
export function synthesizeReading(
	col: SlotColumn,
	tMs: number,
	opts: WaveformOptions = DEFAULT_WAVEFORM,
	quantity: Quantity = "wavelength"
): Reading {
	const random = opts.random ?? Math.random;
	const base = baseWavelength(col.sensorNumber);
	const phase = 2 * Math.PI * (tMs / opts.cycleMs) + col.position * (Math.PI / 4);
	// interrogator resolution
	const nm = Math.round((base + opts.amplitudeNm * Math.sin(phase) + jitter(opts.jitterNm, random)) * 1e5) / 1e5;

	return {
		channel: col.channel,
		fiber: 0,
		sensorSlot: col.sensorSlot,
		value: quantity === "force" ? calibrateForce(base, nm) : nm
	};
}

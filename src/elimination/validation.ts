/**
 * Input validation — throw-on-error checks run before the engine builds
 * anything.
 */

import type { PointSet, SampleId, SamplePoint, Vec3 } from '../types/index.js'
import { InvalidInputError } from './errors.js'

function fail(field: string, message: string, value: unknown): never {
    throw new InvalidInputError(message, field, value)
}

export function assertTargetSamples(value: number): void {
    if (!Number.isInteger(value)) {
        fail('targetSamples', `expected an integer, got ${value}`, value)
    }
    if (value < 0) {
        fail('targetSamples', `must be >= 0, got ${value}`, value)
    }
}

export function assertMeshArea(value: number | undefined): void {
    if (value === undefined) return
    if (!Number.isFinite(value) || value <= 0) {
        fail('meshArea', `must be a positive finite number, got ${value}`, value)
    }
}

function assertPosition(id: number, position: Vec3): void {
    if (position.length !== 3) {
        fail('points', `point ${id} must have 3 coordinates, got ${position.length}`, position)
    }
    for (const c of position) {
        if (!Number.isFinite(c)) {
            fail('points', `point ${id} has a non-finite coordinate`, position)
        }
    }
}

function isPointMap(points: PointSet): points is ReadonlyMap<SampleId, Vec3> {
    return !Array.isArray(points)
}

/**
 * Flatten a point set into an array sorted by ascending id.
 *
 * Sorting here makes array order equal id order, which the engine
 * relies on for its lowest-id tie-break.
 */
export function normalizePoints(points: PointSet): SamplePoint[] {
    const list: SamplePoint[] = []
    if (isPointMap(points)) {
        for (const [id, position] of points) list.push({ id, position })
    } else {
        for (const p of points) list.push({ id: p.id, position: p.position })
    }

    if (list.length === 0) {
        fail('points', 'point set is empty', points)
    }

    for (const p of list) {
        if (!Number.isFinite(p.id)) {
            fail('points', `identifier must be a finite number, got ${p.id}`, p.id)
        }
        assertPosition(p.id, p.position)
    }

    list.sort((a, b) => a.id - b.id)

    for (let i = 1; i < list.length; i++) {
        if (list[i].id === list[i - 1].id) {
            fail('points', `duplicate identifier ${list[i].id}`, list[i].id)
        }
    }

    return list
}

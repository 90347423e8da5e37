/**
 * BlueNoiseParticles — three.js glue around SampleEliminator.
 *
 * The host generates `candidateCount` oversampled positions (particle
 * emitter, surface sampler, ...) and hands them over as a BufferGeometry.
 * thin() eliminates down to `count` and returns a new geometry holding
 * only the survivors, ready to be used as a points cloud or emitter.
 *
 * Emission mode picks the distribution: 'volume' fills the bounding
 * volume, 'faces' and 'verts' stay on the source mesh surface and use
 * its area as the reference for rmax.
 */

import * as THREE from 'three'
import type { HeuristicOverrides, SampleId, SamplePoint } from '../types/index.js'
import { SampleEliminator } from '../elimination/SampleEliminator.js'
import { InvalidInputError } from '../elimination/errors.js'
import { computeMeshArea } from './meshArea.js'

export type EmitFrom = 'verts' | 'faces' | 'volume'

export type SampleQuality = 'low' | 'medium' | 'high'

/** Oversampling factor per quality preset */
export const QUALITY_OVERSAMPLING: Record<SampleQuality, number> = {
    low: 1.5,
    medium: 2,
    high: 5,
}

/** Candidates to generate for `count` survivors at the given quality */
export function oversampledCount(count: number, quality: SampleQuality = 'medium'): number {
    return Math.ceil(count * QUALITY_OVERSAMPLING[quality])
}

export interface BlueNoiseConfig extends HeuristicOverrides {
    /** Number of particles to keep */
    count: number
    /** Where candidates were emitted from (default 'faces') */
    emitFrom?: EmitFrom
    /** Oversampling preset (default 'medium') */
    quality?: SampleQuality
}

export interface BlueNoiseResult {
    /** Surviving positions only */
    geometry: THREE.BufferGeometry
    /** Surviving candidate vertex indices, ascending */
    survivors: SampleId[]
    rmax: number
    rmin: number
}

export class BlueNoiseParticles {
    private config: BlueNoiseConfig

    constructor(config: BlueNoiseConfig) {
        if (!Number.isInteger(config.count) || config.count < 0) {
            throw new InvalidInputError(`must be a non-negative integer, got ${config.count}`, 'count', config.count)
        }
        this.config = config
    }

    get emitFrom(): EmitFrom {
        return this.config.emitFrom ?? 'faces'
    }

    get isVolume(): boolean {
        return this.emitFrom === 'volume'
    }

    /** How many candidates the host should emit */
    get candidateCount(): number {
        return oversampledCount(this.config.count, this.config.quality ?? 'medium')
    }

    /**
     * Eliminate candidate positions down to `count`.
     * Vertex indices of `candidates` serve as sample ids. In surface modes
     * `source` provides the reference area; without it only the bounding
     * volume bounds rmax.
     */
    thin(candidates: THREE.BufferGeometry, source?: THREE.BufferGeometry): BlueNoiseResult {
        const points = this.readCandidates(candidates)

        if (points.length < this.config.count) {
            console.warn(
                `BlueNoiseParticles: ${points.length} candidates for ${this.config.count} particles, nothing eliminated`
            )
        }

        const meshArea = !this.isVolume && source ? computeMeshArea(source) : undefined

        const eliminator = new SampleEliminator(points, {
            targetSamples: this.config.count,
            isVolume: this.isVolume,
            meshArea: meshArea !== undefined && meshArea > 0 ? meshArea : undefined,
            alpha: this.config.alpha,
            gamma: this.config.gamma,
            beta: this.config.beta,
        })
        eliminator.eliminate()

        const alive = eliminator.survivorPoints()
        const positions = new Float32Array(alive.length * 3)
        alive.forEach(({ position }, i) => positions.set(position, i * 3))

        const geometry = new THREE.BufferGeometry()
        geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3))
        geometry.name = candidates.name ? `${candidates.name} BlueNoise` : 'BlueNoise'

        return {
            geometry,
            survivors: alive.map(p => p.id),
            rmax: eliminator.rmax,
            rmin: eliminator.rmin,
        }
    }

    private readCandidates(candidates: THREE.BufferGeometry): SamplePoint[] {
        if (!candidates.hasAttribute('position')) {
            throw new InvalidInputError('geometry has no position attribute', 'candidates', candidates.name)
        }
        const position = candidates.getAttribute('position')
        const points: SamplePoint[] = []
        for (let i = 0; i < position.count; i++) {
            points.push({ id: i, position: [position.getX(i), position.getY(i), position.getZ(i)] })
        }
        return points
    }
}

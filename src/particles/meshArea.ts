/**
 * Surface area of a triangle mesh, used as the reference area for
 * surface-mode elimination.
 */

import * as THREE from 'three'

/**
 * Sum of triangle areas of a BufferGeometry.
 * Indexed geometry is walked through its index, otherwise every three
 * consecutive vertices form a triangle. Trailing vertices are ignored.
 */
export function computeMeshArea(geometry: THREE.BufferGeometry): number {
    if (!geometry.hasAttribute('position')) return 0

    const position = geometry.getAttribute('position')
    const index = geometry.getIndex()
    const triangleCount = Math.floor((index ? index.count : position.count) / 3)

    const a = new THREE.Vector3()
    const b = new THREE.Vector3()
    const c = new THREE.Vector3()
    const triangle = new THREE.Triangle(a, b, c)

    let area = 0
    for (let t = 0; t < triangleCount; t++) {
        const i0 = index ? index.getX(t * 3) : t * 3
        const i1 = index ? index.getX(t * 3 + 1) : t * 3 + 1
        const i2 = index ? index.getX(t * 3 + 2) : t * 3 + 2
        a.fromBufferAttribute(position, i0)
        b.fromBufferAttribute(position, i1)
        c.fromBufferAttribute(position, i2)
        area += triangle.getArea()
    }

    return area
}

import { describe, bench } from 'vitest'
import { renderFramebuffer } from '../src/renderer'
import { renderParallel } from '../src/render'
import { sphereTrace } from '../src/raymarch'
import { fbm } from '../src/fbm'

const FOV = Math.PI / 3

describe('Sphere tracing benchmarks', () => {
  bench('fbm at 1000 points', () => {
    for (let i = 0; i < 1000; i++) {
      fbm([i * 0.013, i * 0.007, 1 - i * 0.011])
    }
  })

  bench('trace the centre ray', () => {
    sphereTrace([0, 0, 3], [0, 0, -1])
  })

  bench('render 80x60 framebuffer', () => {
    renderFramebuffer(80, 60, FOV)
  })

  bench('render 80x60 in 8 inline bands', async () => {
    await renderParallel(80, 60, FOV, { workers: 0, bands: 8 })
  })
})

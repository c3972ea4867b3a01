/**
 * Tests for graph.ts (dependency graph resolver)
 */

import { describe, it, expect } from 'vitest'
import { resolveDependencies, validateLinks } from '../../src/domain/graph.js'
import { DependencyCycleError, UnresolvedInstanceLinkError } from '../../src/lib/errors.js'
import type { InstanceLink, InstanceRef } from '../../src/types.js'

const ref = (plugin: string, instance = 'default'): InstanceRef => ({ plugin, instance })
const link = (source: InstanceRef, target: InstanceRef): InstanceLink => ({ source, target })

const hd = ref('sonarr', 'sonarr-hd')
const uhd = ref('sonarr', 'sonarr-4k')
const prowlarr = ref('prowlarr')
const radarr = ref('radarr')

const options = { installedPlugins: ['prowlarr', 'radarr', 'sonarr', 'lidarr'] }

describe('graph', () => {
  describe('resolveDependencies', () => {
    it('should order independent instances lexicographically', () => {
      const graph = resolveDependencies([radarr, hd, prowlarr, uhd], [], options)
      expect(graph.order).toEqual([prowlarr, radarr, uhd, hd])
      expect(graph.levels).toEqual([[prowlarr, radarr, uhd, hd]])
    })

    it('should put link targets before the instances referencing them', () => {
      const graph = resolveDependencies([hd, uhd], [link(uhd, hd)], options)
      expect(graph.order).toEqual([hd, uhd])
      expect(graph.reverseOrder).toEqual([uhd, hd])
      expect(graph.levels).toEqual([[hd], [uhd]])
      expect(graph.dependenciesOf(uhd)).toEqual([hd])
      expect(graph.dependenciesOf(hd)).toEqual([])
    })

    it('should order across plugins', () => {
      // prowlarr syncs to both sonarr instances
      const graph = resolveDependencies(
        [prowlarr, hd, uhd],
        [link(prowlarr, hd), link(prowlarr, uhd), link(uhd, hd)],
        options
      )
      expect(graph.order).toEqual([hd, uhd, prowlarr])
      expect(graph.levels).toEqual([[hd], [uhd], [prowlarr]])
    })

    it('should give the same order for any input order', () => {
      const links = [link(prowlarr, radarr), link(uhd, hd)]
      const first = resolveDependencies([prowlarr, radarr, hd, uhd], links, options)
      const second = resolveDependencies([uhd, hd, radarr, prowlarr], [...links].reverse(), options)
      expect(second.order).toEqual(first.order)
      expect(first.order).toEqual([radarr, prowlarr, hd, uhd])
    })

    it('should ignore duplicate links', () => {
      const graph = resolveDependencies([hd, uhd], [link(uhd, hd), link(uhd, hd)], options)
      expect(graph.dependenciesOf(uhd)).toEqual([hd])
    })

    it('should reject a cycle and name every instance in it', () => {
      const a = ref('sonarr', 'a')
      const b = ref('sonarr', 'b')

      expect(() => resolveDependencies([a, b], [link(a, b), link(b, a)], options)).toThrow(DependencyCycleError)

      try {
        resolveDependencies([a, b], [link(a, b), link(b, a)], options)
      } catch (error) {
        expect(error).toBeInstanceOf(DependencyCycleError)
        if (error instanceof DependencyCycleError) {
          expect(error.cycle).toEqual([a, b, a])
          expect(error.message).toContain("sonarr.instances['a']")
          expect(error.message).toContain("sonarr.instances['b']")
        }
      }
    })

    it('should reject a self reference', () => {
      expect(() => resolveDependencies([hd], [link(hd, hd)], options)).toThrow(DependencyCycleError)
    })

    it('should report only the cycle, not the path leading to it', () => {
      const a = ref('sonarr', 'a')
      const b = ref('sonarr', 'b')
      const c = ref('sonarr', 'c')
      try {
        resolveDependencies([a, b, c], [link(a, b), link(b, c), link(c, b)], options)
        expect.fail('expected a cycle error')
      } catch (error) {
        expect(error).toBeInstanceOf(DependencyCycleError)
        if (error instanceof DependencyCycleError) {
          expect(error.cycle).toEqual([b, c, b])
        }
      }
    })
  })

  describe('validateLinks', () => {
    it('should accept links between active instances', () => {
      expect(() => validateLinks([hd, uhd], [link(uhd, hd)], options)).not.toThrow()
    })

    it('should report a plugin that is not installed', () => {
      expect(() => validateLinks([hd], [link(hd, ref('readarr'))], options)).toThrow(
        "Unable to resolve instance reference \"sonarr.instances['sonarr-hd'] -> readarr\": plugin 'readarr' is not installed"
      )
    })

    it('should report a plugin that is not configured', () => {
      expect(() => validateLinks([hd], [link(hd, ref('lidarr'))], options)).toThrow(
        "plugin 'lidarr' is not configured or not enabled"
      )
    })

    it('should report a missing instance', () => {
      expect(() => validateLinks([hd], [link(hd, ref('sonarr', 'sonarr-anime'))], options)).toThrow(
        UnresolvedInstanceLinkError
      )
      expect(() => validateLinks([hd], [link(hd, ref('sonarr', 'sonarr-anime'))], options)).toThrow(
        "instance 'sonarr-anime' is not defined for plugin 'sonarr'"
      )
    })
  })
})

import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, afterEach } from 'vitest'
import { extractGo, extractJs, extractPython, extractRuby, extractRust, jsPackageName } from '../src/imports/extractors.js'
import { collectReferences, escalateSeverities } from '../src/imports/index.js'
import { createMissingPackage } from '../src/models.js'
import { pipHandler } from '../src/ecosystems/pip.js'
import type { EcosystemHandler } from '../src/ecosystems/handler.js'
import type { Ecosystem, Severity } from '../src/types.js'
import { cleanupRepos, makeRepo } from './helpers.js'

afterEach(cleanupRepos)

describe('extractors', () => {
  it('reduces JS specifiers to package names', () => {
    expect(jsPackageName('lodash/fp')).toBe('lodash')
    expect(jsPackageName('@scope/pkg/sub/path')).toBe('@scope/pkg')
    expect(jsPackageName('./local')).toBeUndefined()
    expect(jsPackageName('node:fs')).toBeUndefined()
  })

  it('finds import, export, require and dynamic import', () => {
    const source = [
      "import express from 'express'",
      'import {',
      '  z',
      "} from 'zod'",
      "import 'dotenv/config'",
      "export * from '@acme/shared'",
      "const cors = require('cors')",
      "const lazy = await import('chalk')",
      "import helper from './helper.js'"
    ].join('\n')
    expect(extractJs(source).sort()).toEqual(['@acme/shared', 'chalk', 'cors', 'dotenv', 'express', 'zod'])
  })

  it('finds python top-level modules', () => {
    const source = [
      'import os, numpy as np',
      'from flask import Flask',
      'from google.protobuf import message',
      'from . import sibling'
    ].join('\n')
    expect(extractPython(source).sort()).toEqual(['flask', 'google', 'numpy', 'os'])
  })

  it('records every prefix of a go import path', () => {
    const source = [
      'package main',
      '',
      'import (',
      '\t"fmt"',
      '\tgin "github.com/gin-gonic/gin/binding"',
      ')'
    ].join('\n')
    expect(extractGo(source)).toEqual(['fmt', 'github.com', 'github.com/gin-gonic', 'github.com/gin-gonic/gin', 'github.com/gin-gonic/gin/binding'])
  })

  it('finds rust crates but not the standard library', () => {
    const source = ['use std::io;', 'use serde_json::Value;', 'pub use crate::x;', 'extern crate rand;'].join('\n')
    expect(extractRust(source)).toEqual(['serde_json', 'rand'])
  })

  it('finds ruby requires', () => {
    expect(extractRuby("require 'active_support/core_ext'\nrequire_relative 'local'\nrequire(\"json\")")).toEqual(['active_support', 'json'])
  })
})

describe('collectReferences', () => {
  it('scans sources and skips excluded directories', () => {
    const root = makeRepo({
      'src/index.ts': "import express from 'express'",
      'scripts/job.py': 'import requests',
      'node_modules/dep/index.js': "require('hidden-one')",
      'dist/bundle.js': "require('hidden-two')",
      'generated/out.js': "require('hidden-three')"
    })
    const refs = collectReferences(root, { excludes: ['generated'] })
    expect([...refs.keys()].sort()).toEqual(['npm', 'pip'])
    expect([...(refs.get('npm') ?? [])]).toEqual(['express'])
    expect([...(refs.get('pip') ?? [])]).toEqual(['requests'])
  })

  it('skips files above the size limit', () => {
    const root = makeRepo({ 'big.js': `require('huge')\n${'x'.repeat(200)}`, 'small.js': "require('tiny')" })
    expect([...(collectReferences(root, { maxFileBytes: 100 }).get('npm') ?? [])]).toEqual(['tiny'])
  })

  it('ignores directories named like source files', () => {
    const root = makeRepo({ 'ok.js': "require('fine')" })
    fs.mkdirSync(path.join(root, 'weird.js'))
    expect([...(collectReferences(root).get('npm') ?? [])]).toEqual(['fine'])
  })
})

describe('escalateSeverities', () => {
  const pkg = (name: string, ecosystem: Ecosystem, severity: Severity = 'warning') => createMissingPackage({
    name, ecosystem, installCommand: `install ${name}`, detectedFrom: 'manifest', severity
  })
  const refs = (ecosystem: Ecosystem, ...names: string[]) => new Map([[ecosystem, new Set(names)]])

  it('raises referenced packages to critical', () => {
    const out = escalateSeverities([pkg('express', 'npm'), pkg('cors', 'npm')], refs('npm', 'express'))
    expect(out.map(p => [p.name, p.severity])).toEqual([['express', 'critical'], ['cors', 'warning']])
  })

  it('compares normalized names', () => {
    const out = escalateSeverities([pkg('Typing_Extensions', 'pip')], refs('pip', 'typing-extensions'))
    expect(out[0]?.severity).toBe('critical')
  })

  it('uses handler import names', () => {
    const handlers = new Map<Ecosystem, EcosystemHandler>([['pip', pipHandler]])
    const out = escalateSeverities([pkg('beautifulsoup4', 'pip')], refs('pip', 'bs4'), handlers)
    expect(out[0]?.severity).toBe('critical')
  })

  it('never lowers critical', () => {
    const out = escalateSeverities([pkg('express', 'npm', 'critical')], new Map())
    expect(out[0]?.severity).toBe('critical')
  })

  it('is stable when applied twice', () => {
    const seen = refs('npm', 'express')
    const once = escalateSeverities([pkg('express', 'npm')], seen)
    const twice = escalateSeverities(once, seen)
    expect(twice[0]).toBe(once[0])
  })

  it('only counts references from the package\'s own ecosystem', () => {
    const out = escalateSeverities([pkg('yaml', 'npm'), pkg('pyyaml', 'pip')], refs('pip', 'yaml'), new Map<Ecosystem, EcosystemHandler>([['pip', pipHandler]]))
    expect(out.map(p => [p.name, p.severity])).toEqual([['yaml', 'warning'], ['pyyaml', 'critical']])
  })

  it('uses per-package aliases', () => {
    const renamed = pkg('real-crate', 'cargo')
    const out = escalateSeverities([renamed], refs('cargo', 'foo'), new Map(), new Map([[renamed, ['foo']]]))
    expect(out[0]?.severity).toBe('critical')
  })
})

import { existsSync, readdirSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import ts from 'typescript'

type LayerViolation = {
  importerPath: string
  line: number
  moduleSpecifier: string
  /** Resolved file for layer violations, null for forbidden packages. */
  resolvedPath: string | null
}

type AnalysisResult = {
  violations: LayerViolation[]
}

type BoundaryRule = {
  roots: string[]
  forbiddenDirs: string[]
  forbiddenPackages: string[]
}

function walkFiles(rootDir: string, predicate: (filePath: string) => boolean): string[] {
  if (!existsSync(rootDir)) {
    return []
  }

  const stack = [rootDir]
  const output: string[] = []

  let currentDir = stack.pop()
  while (currentDir !== undefined) {
    for (const entry of readdirSync(currentDir, { withFileTypes: true })) {
      const fullPath = path.join(currentDir, entry.name)
      if (entry.isDirectory()) {
        stack.push(fullPath)
        continue
      }
      if (predicate(fullPath)) {
        output.push(fullPath)
      }
    }
    currentDir = stack.pop()
  }

  return output.sort()
}

function isTypeScriptFile(filePath: string): boolean {
  if (!filePath.endsWith('.ts')) {
    return false
  }
  return !filePath.endsWith('.d.ts')
}

function parseSourceFile(filePath: string): ts.SourceFile {
  const content = readFileSync(filePath, 'utf8')
  return ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS)
}

function getLineNumber(sourceFile: ts.SourceFile, node: ts.Node): number {
  const position = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile))
  return position.line + 1
}

function isRelativeSpecifier(moduleSpecifier: string): boolean {
  return moduleSpecifier.startsWith('.') || moduleSpecifier.startsWith('/')
}

function resolveImportTarget(importerPath: string, moduleSpecifier: string): string | null {
  if (!isRelativeSpecifier(moduleSpecifier)) {
    return null
  }

  const unresolved = path.resolve(path.dirname(importerPath), moduleSpecifier)
  const candidates = [
    unresolved,
    `${unresolved}.ts`,
    path.join(unresolved, 'index.ts'),
    unresolved.replace(/\.js$/u, '.ts'),
  ]

  for (const candidate of candidates) {
    const normalized = path.normalize(candidate)
    if (existsSync(normalized) && isTypeScriptFile(normalized)) {
      return normalized
    }
  }

  return null
}

function isUnderDir(targetPath: string, dirPath: string): boolean {
  const relative = path.relative(dirPath, targetPath)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

function matchesPackage(moduleSpecifier: string, packageName: string): boolean {
  return moduleSpecifier === packageName || moduleSpecifier.startsWith(`${packageName}/`)
}

function boundaryRules(srcRoot: string): BoundaryRule[] {
  return [
    {
      roots: [path.join(srcRoot, 'core'), path.join(srcRoot, 'config')],
      forbiddenDirs: [path.join(srcRoot, 'infrastructure'), path.join(srcRoot, 'app')],
      forbiddenPackages: [],
    },
    {
      // Vendor ports describe the SDK surface only; no reactive library.
      roots: [path.join(srcRoot, 'core', 'ports')],
      forbiddenDirs: [],
      forbiddenPackages: ['rxjs'],
    },
  ]
}

export function analyzeLayerBoundaries(repoRoot: string): AnalysisResult {
  const srcRoot = path.join(repoRoot, 'src')
  const violations: LayerViolation[] = []

  for (const rule of boundaryRules(srcRoot)) {
    const files = rule.roots.flatMap((rootDir) => walkFiles(rootDir, isTypeScriptFile))

    for (const filePath of files) {
      const sourceFile = parseSourceFile(filePath)

      const inspectModuleSpecifier = (moduleSpecifierNode: ts.StringLiteralLike): void => {
        const moduleSpecifier = moduleSpecifierNode.text
        const line = getLineNumber(sourceFile, moduleSpecifierNode)

        if (rule.forbiddenPackages.some((name) => matchesPackage(moduleSpecifier, name))) {
          violations.push({ importerPath: filePath, line, moduleSpecifier, resolvedPath: null })
          return
        }

        const resolvedPath = resolveImportTarget(filePath, moduleSpecifier)
        if (!resolvedPath) {
          return
        }
        if (!rule.forbiddenDirs.some((dir) => isUnderDir(resolvedPath, dir))) {
          return
        }
        violations.push({ importerPath: filePath, line, moduleSpecifier, resolvedPath })
      }

      for (const statement of sourceFile.statements) {
        if (ts.isImportDeclaration(statement) && ts.isStringLiteral(statement.moduleSpecifier)) {
          inspectModuleSpecifier(statement.moduleSpecifier)
          continue
        }

        if (
          ts.isExportDeclaration(statement) &&
          statement.moduleSpecifier &&
          ts.isStringLiteral(statement.moduleSpecifier)
        ) {
          inspectModuleSpecifier(statement.moduleSpecifier)
        }
      }
    }
  }

  return { violations }
}

function toRelativePath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, filePath).replace(/\\/gu, '/')
}

export function runCli(argv: readonly string[] = process.argv.slice(2)): number {
  const rootFlagIndex = argv.indexOf('--root')
  const rootArg = rootFlagIndex >= 0 ? argv[rootFlagIndex + 1] : undefined
  const repoRoot = rootArg ? path.resolve(rootArg) : process.cwd()

  const result = analyzeLayerBoundaries(repoRoot)
  if (result.violations.length === 0) {
    console.log('No layer boundary violations found for src/core and src/config.')
    return 0
  }

  console.error('Disallowed layer imports detected:')
  for (const violation of result.violations) {
    const importerPath = toRelativePath(repoRoot, violation.importerPath)
    const target = violation.resolvedPath
      ? `resolved to ${toRelativePath(repoRoot, violation.resolvedPath)}`
      : 'package not allowed in vendor ports'
    console.error(`- ${importerPath}:${violation.line} imports "${violation.moduleSpecifier}" (${target})`)
  }
  return 1
}

const isMainModule =
  typeof process.argv[1] === 'string' && import.meta.url === pathToFileURL(process.argv[1]).href

if (isMainModule) {
  process.exitCode = runCli()
}

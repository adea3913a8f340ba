import assert from 'node:assert'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { expandInputs } from '../src/files.ts'

describe('expandInputs', () => {
	let root: string

	before(async () => {
		root = await mkdtemp(join(tmpdir(), 'pasfix-files-'))
		await mkdir(join(root, 'sub'))
		await writeFile(join(root, 'b.pas'), '')
		await writeFile(join(root, 'a.pas'), '')
		await writeFile(join(root, 'sub', 'c.pas'), '')
		await writeFile(join(root, 'notes.txt'), '')
	})

	after(async () => {
		await rm(root, { force: true, recursive: true })
	})

	it('should take the input literally without multi', async () => {
		assert.deepStrictEqual(await expandInputs('src/*.pas', false), ['src/*.pas'])
	})

	it('should expand a glob in sorted order', async () => {
		assert.deepStrictEqual(await expandInputs(join(root, '**', '*.pas'), true), [
			join(root, 'a.pas'),
			join(root, 'b.pas'),
			join(root, 'sub', 'c.pas'),
		])
	})

	it('should return nothing when no file matches', async () => {
		assert.deepStrictEqual(await expandInputs(join(root, '*.dpr'), true), [])
	})
})

import { describe, test, expect, vi } from 'vitest'
import { ImmutableStateError, EncodingWarning } from '../errors.js'
import { joinPathSegments, removePathSegments, normpath, Path } from './Path.js'

describe('Path Utilities', () => {
  test('joinPathSegments сохраняет слеш на стыке', () => {
    expect(joinPathSegments(['a'], ['b'])).toStrictEqual(['a', 'b'])
    expect(joinPathSegments(['a', ''], ['b'])).toStrictEqual(['a', 'b'])
    expect(joinPathSegments(['a'], ['', 'b'])).toStrictEqual(['a', 'b'])
    expect(joinPathSegments(['a', ''], ['', 'b'])).toStrictEqual(['a', '', 'b'])
    // [''] и пустые списки пропускаются
    expect(joinPathSegments(['a'], [''], [], ['b'])).toStrictEqual(['a', 'b'])
    expect(joinPathSegments()).toStrictEqual([])
  })

  test('removePathSegments удаляет только совпадающий хвост', () => {
    expect(removePathSegments(['', 'a', 'b', 'c'], ['b', 'c'])).toStrictEqual(['', 'a', ''])
    expect(removePathSegments(['', 'a', 'b', 'c'], ['', 'b', 'c'])).toStrictEqual(['', 'a'])
    expect(removePathSegments(['', 'a', 'b', 'c'], ['a', 'b'])).toStrictEqual(['', 'a', 'b', 'c'])
    expect(removePathSegments(['a', 'b'], ['a', 'b'])).toStrictEqual([])
    expect(removePathSegments(['a'], ['x', 'a', 'b'])).toStrictEqual(['a'])
    // [''] означает завершающий слеш
    expect(removePathSegments(['a', ''], [''])).toStrictEqual(['a'])
    expect(removePathSegments([''], [''])).toStrictEqual([])
  })

  test('normpath', () => {
    expect(normpath('')).toBe('.')
    expect(normpath('/a/./b/../c//d')).toBe('/a/c/d')
    expect(normpath('///a')).toBe('/a')
    expect(normpath('//a/b')).toBe('//a/b')
    expect(normpath('../a')).toBe('../a')
    expect(normpath('/..')).toBe('/')
    expect(normpath('a/..')).toBe('.')
  })
})

describe('Path', () => {
  test('load', () => {
    const path = new Path('/a/b/')
    expect(path.segments).toStrictEqual(['a', 'b', ''])
    expect(path.isAbsolute).toBe(true)
    expect(path.isDir).toBe(true)
    expect(path.isFile).toBe(false)
    expect(path.toString()).toBe('/a/b/')

    expect(new Path('').toString()).toBe('')
    expect(new Path('').isDir).toBe(true)
    expect(new Path('/').segments).toStrictEqual([''])
    expect(new Path('/').toString()).toBe('/')
    expect(new Path(['', 'x', 'y']).toString()).toBe('/x/y')
    expect(new Path(new Path('/c/d')).toString()).toBe('/c/d')
  })

  test('сегменты декодируются, неверно закодированные сохраняются буквально', () => {
    const path = new Path('a%20b/c d/100%')
    expect(path.segments).toStrictEqual(['a b', 'c d', '100%'])
    expect(path.toString()).toBe('a%20b/c%20d/100%25')
  })

  test('strict сообщает о неверно закодированных сегментах', () => {
    const onWarning = vi.fn()
    new Path('a/c d/e f', { strict: true, onWarning })
    expect(onWarning).toHaveBeenCalledTimes(2)
    expect(onWarning.mock.calls[0]?.[0]).toBeInstanceOf(EncodingWarning)

    const quiet = vi.fn()
    new Path('c d', { onWarning: quiet })
    expect(quiet).not.toHaveBeenCalled()
  })

  test('add', () => {
    expect(new Path('/a/').add('b').toString()).toBe('/a/b')
    expect(new Path('a').add('/b').toString()).toBe('a/b')
    expect(new Path('/').add('a').toString()).toBe('/a')
    expect(new Path().add(['a', 'b']).toString()).toBe('a/b')
    expect(new Path('/a').add(['b c', '']).toString()).toBe('/a/b%20c/')
  })

  test('remove', () => {
    expect(new Path('/a/b/c').remove('b/c').toString()).toBe('/a/')
    expect(new Path('/a/b/c').remove('/b/c').toString()).toBe('/a')
    expect(new Path('/a/b/c').remove('x/c').toString()).toBe('/a/b/c')
    expect(new Path('/a/b/c').remove(true).toString()).toBe('')
    expect(new Path('a/b/').remove('/').toString()).toBe('a/b')
  })

  test('normalize идемпотентна', () => {
    const path = new Path('/a/./b/../c//d/').normalize()
    expect(path.toString()).toBe('/a/c/d/')
    expect(path.normalize().toString()).toBe('/a/c/d/')

    expect(new Path('//a').normalize().toString()).toBe('/a')
    expect(new Path('a/..').normalize().toString()).toBe('.')
    expect(new Path('').normalize().toString()).toBe('')
  })

  test('forced: путь с сегментами всегда абсолютный', () => {
    const path = new Path('a')
    path._setAbsoluteMode('forced')
    expect(path.isAbsolute).toBe(true)
    expect(path.toString()).toBe('/a')
    expect(() => { path.isAbsolute = false }).toThrow(ImmutableStateError)

    path.load('')
    expect(path.isAbsolute).toBe(false)
    // Без сегментов запись разрешена
    path.isAbsolute = true
    expect(path.toString()).toBe('/')
  })

  test('mutable: isAbsolute можно изменить', () => {
    const path = new Path('a/b')
    path.isAbsolute = true
    expect(path.toString()).toBe('/a/b')
  })

  test('copy, equals, toJSON', () => {
    const path = new Path('/a/b')
    const copy = path.copy()
    expect(copy.equals(path)).toBe(true)
    copy.add('c')
    expect(copy.equals(path)).toBe(false)
    expect(path.toString()).toBe('/a/b')
    expect(new Path('a/b').equals(path)).toBe(false)

    expect(path.toJSON()).toStrictEqual({
      encoded: '/a/b',
      isDir: false,
      isFile: true,
      isAbsolute: true,
      segments: ['a', 'b']
    })
  })
})

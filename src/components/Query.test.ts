import { describe, test, expect, vi } from 'vitest'
import { EncodingWarning } from '../errors.js'
import { QueryParams } from './QueryParams.js'
import { Query } from './Query.js'

describe('Query', () => {
  test('ключ без значения отличается от пустого значения', () => {
    const query = new Query('a=&b')
    expect(query.params.allItems()).toStrictEqual([['a', ''], ['b', null]])
    expect(query.toString()).toBe('a=&b')
  })

  test('декодирование строки запроса', () => {
    const query = new Query('a+b=c%20d&&e=%zz&=v')
    expect(query.params.allItems()).toStrictEqual([['a b', 'c d'], ['e', '%zz'], ['', 'v']])
    expect(query.toString()).toBe('a+b=c+d&e=%25zz&=v')
  })

  test('источники параметров', () => {
    expect(new Query([['a', 1], ['a', 2]]).toString()).toBe('a=1&a=2')
    expect(new Query(new Map([['a', true]])).toString()).toBe('a=true')
    expect(new Query(new QueryParams({ x: null })).toString()).toBe('x')
    expect(new Query(new Query('y=1')).toString()).toBe('y=1')
    expect(new Query().isEmpty()).toBe(true)
  })

  test('set', () => {
    expect(new Query().set({ 1: [1, 11, 111] }).params.allItems()).toStrictEqual([['1', 1], ['1', 11], ['1', 111]])
    expect(new Query({ 1: null }).set([[1, 1], [2, 2], [1, 11]]).params.allItems()).toStrictEqual([['1', 1], ['2', 2], ['1', 11]])
    expect(new Query('1').set([[1, null], [2, 2]]).toString()).toBe('1&2=2')
  })

  test('add', () => {
    expect(new Query('a=1').add({ a: 2, b: [3, 4] }).toString()).toBe('a=1&a=2&b=3&b=4')
    expect(new Query('a=1').add('a=1').toString()).toBe('a=1&a=1')
  })

  test('remove', () => {
    const query = new Query('a=1&a=2&b=3&c')
    expect(query.remove('c').toString()).toBe('a=1&a=2&b=3')
    expect(query.remove([['a', '1']]).toString()).toBe('a=2&b=3')
    expect(query.remove(['b']).toString()).toBe('a=2')
    expect(query.remove(true).toString()).toBe('')

    expect(new Query('a=1&a=2&a=1').remove({ a: '1' }).toString()).toBe('a=1&a=2')
    expect(new Query('a=1&b=2').remove(new Map([['b', 2]])).toString()).toBe('a=1')
  })

  test('encode', () => {
    const query = new Query({ 'a': 'b/c d', 'k y': 'x+y' })
    expect(query.encode()).toBe('a=b%2Fc+d&k+y=x%2By')
    expect(query.encode({ quotePlus: false })).toBe('a=b%2Fc%20d&k%20y=x%2By')
    expect(query.encode({ dontQuote: '/' })).toBe('a=b/c+d&k+y=x%2By')
    // Символ # не входит в допустимый набор и кодируется всегда
    expect(query.encode({ dontQuote: '#/' })).toBe('a=b/c+d&k+y=x%2By')
    expect(query.encode({ dontQuote: true })).toBe('a=b/c+d&k+y=x+y')
    expect(query.encode({ delimiter: ';' })).toBe('a=b%2Fc+d;k+y=x%2By')
  })

  test('params изменяются напрямую', () => {
    const query = new Query('a=1')
    query.params.set('x', ['1', '2'])
    expect(query.toString()).toBe('a=1&x=1&x=2')

    query.params = 'b=1&b=2'
    expect(query.params.allItems()).toStrictEqual([['b', '1'], ['b', '2']])
  })

  test('strict сообщает о неверно закодированной строке один раз', () => {
    const onWarning = vi.fn()
    const query = new Query('a=b c&d=e f', { strict: true, onWarning })
    expect(onWarning).toHaveBeenCalledTimes(1)
    expect(onWarning.mock.calls[0]?.[0]).toBeInstanceOf(EncodingWarning)
    expect(query.params.allItems()).toStrictEqual([['a', 'b c'], ['d', 'e f']])
  })

  test('copy, equals, toJSON', () => {
    const query = new Query('a=1&b')
    const copy = query.copy()
    expect(copy.equals(query)).toBe(true)
    copy.add({ c: 3 })
    expect(copy.equals(query)).toBe(false)
    expect(query.toJSON()).toStrictEqual([['a', '1'], ['b', null]])
  })
})

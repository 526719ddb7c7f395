import { describe, expect, test } from 'vitest';
import { selectOperation } from '../../src/resolver/operation.ts';

const cwd = () => '/home/user/here';

describe('selectOperation', () => {
  test('mark takes precedence over everything', () => {
    expect(
      selectOperation({ mark: 'w', ignore: true, jump: 'x', directory: ['f', 'a'] }, cwd),
    ).toEqual({ kind: 'mark', name: 'w', remove: false, directory: '/home/user/here' });
  });

  test('delete turns a mark into a removal', () => {
    expect(selectOperation({ mark: 'w', delete: true }, cwd)).toEqual({
      kind: 'mark',
      name: 'w',
      remove: true,
      directory: '/home/user/here',
    });
  });

  test('ignore comes before jump', () => {
    expect(selectOperation({ ignore: true, jump: 'x' }, cwd)).toEqual({
      kind: 'ignore',
      remove: false,
      directory: '/home/user/here',
    });
  });

  test('the current-directory override replaces cwd', () => {
    expect(selectOperation({ ignore: true, delete: true, currentDirectory: '/link' }, cwd)).toEqual({
      kind: 'ignore',
      remove: true,
      directory: '/link',
    });
  });

  test('jump comes before add and search', () => {
    expect(selectOperation({ jump: 'x', add: '/a', directory: ['/b'] }, cwd)).toEqual({
      kind: 'jump',
      name: 'x',
    });
  });

  test('add comes before search', () => {
    expect(selectOperation({ add: '/a', directory: ['/b'] }, cwd)).toEqual({
      kind: 'add',
      directory: '/a',
    });
  });

  test('no arguments opens the menu', () => {
    expect(selectOperation({}, cwd)).toEqual({ kind: 'menu' });
    expect(selectOperation({ directory: [] }, cwd)).toEqual({ kind: 'menu' });
  });

  test('positional arguments are a search', () => {
    expect(selectOperation({ directory: ['r', 'src'] }, cwd)).toEqual({
      kind: 'search',
      args: ['r', 'src'],
    });
  });

  test('empty flag values count as absent', () => {
    expect(selectOperation({ mark: '', jump: '' }, cwd)).toEqual({ kind: 'menu' });
  });

  test('cwd is only read for mark and ignore', () => {
    const failing = () => {
      throw new Error('cwd unavailable');
    };
    expect(selectOperation({ directory: ['/x'] }, failing)).toEqual({ kind: 'search', args: ['/x'] });
  });
});

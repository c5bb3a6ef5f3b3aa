import { join } from 'path';
import { symlinkSync } from 'fs';
import Context from '../src/context';
import Request from '../src/request';
import StdResolver from '../src/std-resolver';
import ScriptLoader from '../src/script-loader';
import { isResolveError } from '../src/errors';
import { expectWarning, throwOnWarnings } from '../src/messages';
import { catchError, project, type Fixture } from './helpers';

function setup(files: Fixture, searchPaths: string[] = []) {
  let root = project(files);
  let context = new Context({ mainDir: root, searchPaths, debugger: { type: 'disabled' } });
  return { root, context };
}

describe('std resolver', () => {
  throwOnWarnings();

  describe('relative requests', () => {
    test('tries the loaders extensions', () => {
      let { root, context } = setup({ 'a.js': 'module.exports = "a";' });
      expect(context.require('./a')).toBe('a');
      expect(context.require('./a', { exports: false }).filename).toBe(join(root, 'a.js'));
    });

    test('finds json data', () => {
      let { context } = setup({ 'data.json': '{ "answer": 42 }' });
      expect(context.require('./data')).toEqual({ answer: 42 });
    });

    test('falls back to the index of a directory', () => {
      let { root, context } = setup({ lib: { 'index.js': 'module.exports = "index";' } });
      expect(context.require('./lib')).toBe('index');
      expect(context.resolve('./lib', root).filename).toBe(join(root, 'lib', 'index.js'));
    });

    test('reports the one place it looked', () => {
      let { root, context } = setup({});
      let err = catchError(() => context.require('./missing'));
      if (!isResolveError(err)) {
        throw err;
      }
      expect(err.searchPaths).toEqual([join(root, 'missing')]);
      expect(err.message).toBe(`cannot find module "./missing" from ${root}\n  searched: ${join(root, 'missing')}`);
    });

    test('ignores files that no loader takes', () => {
      let { context } = setup({ 'notes.txt': 'hello' });
      expect(isResolveError(catchError(() => context.require('./notes.txt')))).toBe(true);
    });
  });

  describe('packages', () => {
    test('follows the manifest main', () => {
      let { root, context } = setup({
        node_modules: {
          pkg: {
            'package.json': JSON.stringify({ name: 'pkg', main: './main.js' }),
            'main.js': 'module.exports = "main";',
            'index.js': 'module.exports = "index";',
          },
        },
      });
      expect(context.require('pkg')).toBe('main');
      let module = context.resolve('pkg', root);
      expect(module.filename).toBe(join(root, 'node_modules', 'pkg', 'main.js'));
      expect(module.pkg?.name).toBe('pkg');
      expect(module.pkg?.root).toBe(join(root, 'node_modules', 'pkg'));
    });

    test('warns about a main that does not exist and uses the index', () => {
      let { context } = setup({
        node_modules: {
          pkg: {
            'package.json': JSON.stringify({ name: 'pkg', main: 'missing.js' }),
            'index.js': 'module.exports = "index";',
          },
        },
      });
      let value: unknown;
      let warned = expectWarning(/names a "main" of missing\.js, which does not exist/, () => {
        value = context.require('pkg');
      });
      expect(warned).toBe(true);
      expect(value).toBe('index');
    });

    test('finds files inside scoped packages', () => {
      let { root, context } = setup({
        node_modules: { '@scope': { tools: { lib: { 'x.js': 'module.exports = "x";' } } } },
      });
      expect(context.require('@scope/tools/lib/x')).toBe('x');
      expect(context.resolve('@scope/tools/lib/x.js', root).filename).toBe(
        join(root, 'node_modules', '@scope', 'tools', 'lib', 'x.js')
      );
    });

    test('walks up from the requesting directory', () => {
      let { root, context } = setup({
        node_modules: { pkg: { 'index.js': 'module.exports = "outer";' } },
        src: {
          node_modules: { pkg: { 'index.js': 'module.exports = "inner";' } },
          deep: { 'a.js': 'module.exports = require("pkg");' },
        },
      });
      expect(context.require('./src/deep/a')).toBe('inner');
      expect(context.mainRequire.forDirectory('src/deep').call('pkg')).toBe('inner');
      expect(context.require('pkg')).toBe('outer');
      expect(context.resolve('pkg', join(root, 'other')).filename).toBe(join(root, 'node_modules', 'pkg', 'index.js'));
    });

    test('follows a link file to where the package lives', () => {
      let { root, context } = setup({
        node_modules: { linked: { '.nodule-link': '../../elsewhere/linked\n' } },
        elsewhere: {
          linked: {
            'index.js': 'module.exports = "linked";',
            util: { 'helper.js': 'module.exports = "helper";' },
          },
        },
      });
      expect(context.require('linked')).toBe('linked');
      expect(context.require('linked/util/helper')).toBe('helper');
      expect(context.resolve('linked', root).filename).toBe(join(root, 'elsewhere', 'linked', 'index.js'));
    });

    test('reports the link target when a linked package is missing', () => {
      let { root, context } = setup({
        node_modules: { pkg: { '.nodule-link': '../../real-pkg' } },
      });
      let err = catchError(() => context.require('pkg'));
      if (!isResolveError(err)) {
        throw err;
      }
      expect(err.searchPaths[0]).toBe(join(root, 'real-pkg'));
      expect(err.searchPaths).not.toContain(join(root, 'node_modules', 'pkg'));
    });
  });

  describe('search paths', () => {
    test('searches the request path after the modules directories', () => {
      let { root, context } = setup({
        vendor: { 'tool.js': 'module.exports = "vendored";' },
      });
      let facade = context.mainRequire;
      expect(isResolveError(catchError(() => facade.call('tool')))).toBe(true);
      facade.path.push(join(root, 'vendor'));
      expect(facade.call('tool')).toBe('vendored');
    });

    test('searches its own paths last', () => {
      let root = project({ shared: { 'common.js': 'module.exports = "common";' } });
      let context = new Context({
        mainDir: root,
        searchPaths: [join(root, 'shared')],
        debugger: { type: 'disabled' },
      });
      expect(context.require('common')).toBe('common');
    });

    test('reports the places it looked, in order', () => {
      let { root, context } = setup({}, ['/global']);
      let facade = context.mainRequire;
      facade.path.push('/extra');
      let err = catchError(() => facade.call('nothing'));
      if (!isResolveError(err)) {
        throw err;
      }
      let resolver = context.resolvers[0];
      if (!(resolver instanceof StdResolver)) {
        throw new Error('expected the std resolver');
      }
      let expected = resolver.lookupDirectories(err.request).map(dir => join(dir, 'nothing'));
      expect(err.searchPaths).toEqual(expected);
      expect(err.searchPaths[0]).toBe(join(root, 'node_modules', 'nothing'));
      expect(err.searchPaths.slice(-2)).toEqual(['/extra/nothing', '/global/nothing']);
    });

    test('skips ancestors that are themselves modules directories', () => {
      let context = new Context({ bare: true, mainDir: '/w', debugger: { type: 'disabled' } });
      let resolver = new StdResolver(['/global'], [new ScriptLoader()]);
      let request = new Request(context, '/w/node_modules/a/node_modules/b', 'c', ['/extra']);
      expect(resolver.lookupDirectories(request)).toEqual([
        '/w/node_modules/a/node_modules/b/node_modules',
        '/w/node_modules/a/node_modules',
        '/w/node_modules',
        '/node_modules',
        '/extra',
        '/global',
      ]);
    });
  });

  test('a symlinked file is the same module as its target', () => {
    let { root, context } = setup({ real: { 'a.js': 'module.exports = {};' } });
    symlinkSync(join(root, 'real'), join(root, 'alias'));
    let viaAlias = context.resolve('./alias/a', root);
    expect(viaAlias.filename).toBe(join(root, 'real', 'a.js'));
    expect(context.resolve('./real/a', root)).toBe(viaAlias);
    expect(context.require('./alias/a')).toBe(context.require('./real/a'));
  });

  test('files outside any package have no package', () => {
    let { root, context } = setup({ 'a.js': '' });
    expect(context.resolve('./a', root).pkg).toBeUndefined();
  });
});

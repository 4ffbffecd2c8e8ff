import * as fs from 'fs';
import * as path from 'path';

describe('Domain layer separation', () => {
    const domainDir = path.join(__dirname, '../../src/domain');
    const sources = fs.readdirSync(domainDir).filter(f => f.endsWith('.ts'));

    test('domain modules import only other domain modules', () => {
        const outward = sources.flatMap(file => {
            const text = fs.readFileSync(path.join(domainDir, file), 'utf8');
            const specifiers = [...text.matchAll(/from '([^']+)'/g)].map(m => m[1]);
            return specifiers
                .filter(spec => !spec.startsWith('./'))
                .map(spec => `${file} -> ${spec}`);
        });

        expect(outward).toEqual([]);
    });

    test('the logging port lives in the domain', () => {
        expect(sources).toContain('logger.ts');
    });
});

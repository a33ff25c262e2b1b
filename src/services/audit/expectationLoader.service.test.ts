// src/services/audit/expectationLoader.service.test.ts
import path from 'path';
import container from '../../container';
import { ConfigError } from '../../utils/errors';
import { ExpectationLoaderService } from './expectationLoader.service';

const fixture = (name: string): string => path.join(__dirname, '__fixtures__', name);

describe('ExpectationLoaderService', () => {
    const loader = container.resolve(ExpectationLoaderService);

    it('loads a definition file and fills in defaults', async () => {
        const set = await loader.loadFromFile(fixture('expectations.json'));

        expect(set.name).toBe('people-checks');
        expect(set.rules.map(rule => [rule.id, rule.severity])).toEqual([
            ['age-nulls', 'error'],
            ['rule-2', 'warn'],
        ]);
        expect(set.rules[1].threshold).toEqual([18, 65]);
        expect(set.groups).toEqual([
            { name: 'age-quality', combinator: 'AND', members: ['age-nulls', 'rule-2'] },
        ]);
    });

    it('rejects a file that is not valid JSON', async () => {
        const error = await loader.loadFromFile(fixture('broken.json')).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({ code: 'CONFIG_ERROR' });
    });

    it('rejects a file that cannot be read', async () => {
        await expect(loader.loadFromFile(fixture('absent.json'))).rejects.toBeInstanceOf(ConfigError);
    });

    it('lists every issue of an invalid definition', () => {
        const issuesFor = (raw: unknown): string[] => {
            try {
                loader.parse(raw);
                return [];
            } catch (error) {
                return error instanceof ConfigError ? error.issues : [];
            }
        };

        expect(issuesFor({ rules: [{ metric: 'mean', operator: 'le', threshold: 1 }] }))
            .toEqual(["rules[0]: metric 'mean' requires a column"]);
        expect(issuesFor({ rules: [{ column: 'age', metric: 'mean', operator: 'in_range', threshold: [5, 1] }] }))
            .toEqual(['rules[0]: range low 5 is greater than high 1']);
    });
});

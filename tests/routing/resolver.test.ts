import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => mockLogger,
}));

import * as Routing from '../../src/routing';
import { getDefaultRules, RuleCatalog } from '../../src/rules';

const withStrategy = (strategy: Partial<RuleCatalog['strategy']>): RuleCatalog => {
    const defaults = getDefaultRules();
    return { ...defaults, strategy: { ...defaults.strategy, ...strategy } };
};

const oracleReturning = (suggestion: Routing.FolderSuggestion | null): Routing.FolderOracle & { suggestFolder: ReturnType<typeof vi.fn> } => ({
    suggestFolder: vi.fn().mockResolvedValue(suggestion),
});

describe('Folder Resolution Engine', () => {
    let routing: Routing.RoutingInstance;

    beforeEach(() => {
        vi.clearAllMocks();
        routing = Routing.create(getDefaultRules());
    });

    it('routes a deployment plan to the operations folder by category', async () => {
        const decision = await routing.resolveFolder('运维部署方案', ['技术方案/DevOps运维', '项目文档']);

        expect(decision.suggestedPath).toBe('技术方案/DevOps运维');
        expect(decision.createNew).toBe(false);
        expect(decision.stage).toBe('semantic');
    });

    it('creates a folder named after the subject when the archive is empty', async () => {
        const decision = await routing.resolveFolder('Q3 Report', []);

        expect(decision).toMatchObject({ suggestedPath: 'Q3 Report', createNew: true, stage: 'forced-subject' });
    });

    it('prefers a folder whose name appears in the subject', async () => {
        const decision = await routing.resolveFolder('Finance quarterly', ['Projects', 'Archive/Finance']);

        expect(decision).toMatchObject({ suggestedPath: 'Archive/Finance', createNew: false, stage: 'exact' });
    });

    it('proposes the category folder when none exists yet', async () => {
        const decision = await routing.resolveFolder('运维部署方案', ['项目文档']);

        expect(decision).toMatchObject({ suggestedPath: 'DevOps运维', createNew: true, stage: 'semantic-new' });
    });

    it('falls back to a generic folder when new folders are forbidden', async () => {
        const strict = Routing.create(withStrategy({ forceExisting: true }));

        const decision = await strict.resolveFolder('运维部署方案', ['项目文档']);

        expect(decision).toMatchObject({ suggestedPath: '项目文档', createNew: false, stage: 'forced-fallback' });
    });

    it('matches by similarity when the subject is part of a folder name', async () => {
        const decision = await routing.resolveFolder('sync', ['Team/Sync Meetings']);

        expect(decision).toMatchObject({ suggestedPath: 'Team/Sync Meetings', createNew: false, stage: 'similarity' });
        expect(decision.reasoning).toBe('Folder "Team/Sync Meetings" is similar to the subject (score 1.4)');
    });

    it('applies generic rules before generic folders', async () => {
        const decision = await routing.resolveFolder('招聘计划 draft', ['Misc', 'People/HR Team']);

        expect(decision).toMatchObject({ suggestedPath: 'People/HR Team', createNew: false, stage: 'forced-generic-rule' });
    });

    describe('with an oracle', () => {
        const catalog = ['Alpha', 'Beta/Gamma'];

        it('accepts a suggestion that names an existing folder', async () => {
            const oracle = oracleReturning({ suggestedPath: 'beta/gamma ', createNew: false, reasoning: 'fits' });

            const decision = await routing.resolveFolder('Quarterly numbers', catalog, oracle, { structure: '# tree' });

            expect(decision).toEqual({ suggestedPath: 'Beta/Gamma', createNew: false, reasoning: 'fits', stage: 'oracle' });
            expect(oracle.suggestFolder).toHaveBeenCalledWith({ subject: 'Quarterly numbers', catalog, structure: '# tree' });
        });

        it('ignores a suggestion outside the catalog', async () => {
            const oracle = oracleReturning({ suggestedPath: 'Finance', createNew: true, reasoning: 'new' });

            const decision = await routing.resolveFolder('Quarterly numbers', catalog, oracle);

            expect(decision).toMatchObject({ suggestedPath: 'Alpha', createNew: false, stage: 'forced-fallback' });
            expect(mockLogger.info).toHaveBeenCalledWith('Oracle suggested "%s", which is not an existing folder; ignoring it', 'Finance');
        });

        it('survives an oracle failure', async () => {
            const oracle: Routing.FolderOracle = { suggestFolder: vi.fn().mockRejectedValue(new Error('timeout')) };

            const decision = await routing.resolveFolder('Quarterly numbers', catalog, oracle);

            expect(decision.stage).toBe('forced-fallback');
            expect(mockLogger.warn).toHaveBeenCalledWith('Oracle consultation failed, falling back: %s', 'timeout');
        });

        it('is not consulted when a local stage decides', async () => {
            const oracle = oracleReturning(null);
            await routing.resolveFolder('Finance quarterly', ['Finance'], oracle);
            expect(oracle.suggestFolder).not.toHaveBeenCalled();
        });

        it('is not consulted for an empty archive', async () => {
            const oracle = oracleReturning({ suggestedPath: 'Anything', createNew: true, reasoning: '' });
            const decision = await routing.resolveFolder('Q3 Report', [], oracle);
            expect(oracle.suggestFolder).not.toHaveBeenCalled();
            expect(decision.stage).toBe('forced-subject');
        });
    });

    describe('forceResolve on an empty archive', () => {
        it('creates the category folder when new folders are allowed', () => {
            const forced = Routing.create(withStrategy({ forceExisting: true }));
            expect(forced.forceResolve('运维部署方案', [])).toMatchObject({
                suggestedPath: 'DevOps运维',
                createNew: true,
                stage: 'forced-new-category',
            });
        });

        it('uses the sanitized subject when new folders are not allowed', () => {
            const closed = Routing.create(withStrategy({ allowNewFolders: false }));
            expect(closed.forceResolve('运维/部署', [])).toMatchObject({
                suggestedPath: '运维／部署',
                createNew: true,
                stage: 'forced-subject',
            });
        });
    });

    it('returns the same decision for the same input', async () => {
        const catalog = ['技术方案/DevOps运维', '项目文档', 'Misc'];
        for (const subject of ['运维部署方案', 'Q3 Report', '招聘计划', 'sync']) {
            const first = await routing.resolveFolder(subject, catalog);
            const second = await routing.resolveFolder(subject, catalog);
            expect(second).toEqual(first);
        }
    });

    it('only names catalog members unless a creating stage decided', async () => {
        const catalog = ['技术方案/DevOps运维', '项目文档', 'Team/Sync Meetings', 'Misc'];
        const creating = ['semantic-new', 'forced-new-category', 'forced-subject'];
        const subjects = ['运维部署方案', 'Q3 Report', '招聘计划', 'sync', '会议纪要', '', '???', 'API 设计'];

        for (const subject of subjects) {
            const decision = await routing.resolveFolder(subject, catalog);
            if (decision.createNew) {
                expect(creating).toContain(decision.stage);
            } else {
                expect(catalog).toContain(decision.suggestedPath);
            }
        }
    });

    it('offers a one-shot resolver with the built-in rules', async () => {
        const decision = await Routing.resolveFolder('运维部署方案', ['技术方案/DevOps运维']);
        expect(decision.suggestedPath).toBe('技术方案/DevOps运维');
    });
});

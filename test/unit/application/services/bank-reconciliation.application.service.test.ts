// test/unit/application/services/bank-reconciliation.application.service.test.ts
import { BankReconciliationApplicationService } from '@/core/application/services/bank-reconciliation.application.service';
import { EventDispatcher } from '@/core/application/handlers/event-dispatcher.service';
import { BankTransactionType } from '@/core/domain/entities/bank-transaction.entity';
import { ReconciliationEntity, ReconciliationStatus } from '@/core/domain/entities/reconciliation.entity';
import { BaseDomainEvent } from '@/core/domain/events/base-domain.event';
import { IUnitOfWorkFactory } from '@/core/domain/repositories/unit-of-work';
import { Money } from '@/core/domain/value-objects/money.vo';
import { logger } from '@/infrastructure/monitoring/logger.service';
import {
    InMemoryReconciliationStore,
    TEST_ACCOUNT_ID,
    TEST_GL_ACCOUNT_ID
} from '@test/helpers/in-memory-store';
import { failureOf, unwrap } from '@test/helpers/results';

jest.mock('@/infrastructure/monitoring/logger.service', () => ({
    logger: {
        info: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
        debug: jest.fn(),
        event: jest.fn(),
        audit: jest.fn()
    }
}));

const STATEMENT_DATE = '2024-03-31';
const SETTINGS = { tolerance: 0.01, historyMaxPageSize: 50 };

describe('BankReconciliationApplicationService', () => {
    let store: InMemoryReconciliationStore;
    let service: BankReconciliationApplicationService;

    const openDraft = async (statementEndingBalance = 0, statementDate = STATEMENT_DATE): Promise<ReconciliationEntity> =>
        unwrap(await service.getOrCreateDraft({
            bankAccountId: TEST_ACCOUNT_ID,
            statementDate,
            statementEndingBalance,
            actorId: 'clerk-1'
        }));

    beforeEach(() => {
        store = new InMemoryReconciliationStore();
        store.seedAccount({}, 0);
        service = new BankReconciliationApplicationService(store, SETTINGS);
    });

    describe('getOrCreateDraft', () => {
        it('opens a draft and records an opened event', async () => {
            const draft = await openDraft(1200.5);

            expect(draft.status).toBe(ReconciliationStatus.DRAFT);
            expect(draft.statementEndingBalance.amount).toBe(1200.5);
            expect(draft.createdBy).toBe('clerk-1');
            expect(store.committedEvents.map(event => event.eventType)).toEqual(['ReconciliationDraftOpened']);
            expect(store.committedEvents[0].getPayload()).toMatchObject({ resumed: false, statementEndingBalance: 1200.5 });
        });

        it('resumes the open draft with the new balance and notes', async () => {
            const draft = await openDraft(100);

            const resumed = unwrap(await service.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 150.25,
                actorId: 'clerk-2',
                notes: 'bank corrected its figure'
            }));

            expect(resumed.id).toBe(draft.id);
            expect(store.reconciliation(draft.id).statementEndingBalance.amount).toBe(150.25);
            expect(store.reconciliation(draft.id).notes).toBe('bank corrected its figure');
            expect(store.committedEvents[1].getPayload()).toMatchObject({ actorId: 'clerk-2', resumed: true });
        });

        it('opens separate drafts for different statement dates', async () => {
            const march = await openDraft(0, '2024-03-31');
            const april = await openDraft(0, '2024-04-30');

            expect(april.id).not.toBe(march.id);
        });

        it('resumes the draft a concurrent session inserted first', async () => {
            const createdAt = new Date('2024-04-01T00:00:00.000Z');
            store.beforeInsertDraft = () => {
                store.beforeInsertDraft = null;
                store.reconciliations.set('rec-winner', {
                    id: 'rec-winner',
                    bankAccountId: TEST_ACCOUNT_ID,
                    statementDate: STATEMENT_DATE,
                    statementEndingBalance: Money.of(10),
                    calculatedBookBalance: null,
                    difference: null,
                    status: ReconciliationStatus.DRAFT,
                    notes: null,
                    createdBy: 'clerk-9',
                    createdAt,
                    updatedAt: createdAt,
                    finalizedAt: null
                });
            };

            const draft = await openDraft(20);

            expect(draft.id).toBe('rec-winner');
            expect(store.reconciliations.size).toBe(1);
            expect(store.reconciliation('rec-winner').statementEndingBalance.amount).toBe(20);
        });

        it('reports an unknown bank account as not found', async () => {
            const failure = failureOf(await service.getOrCreateDraft({
                bankAccountId: 'bank-acc-404',
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('NOT_FOUND');
            expect(failure.message).toBe('BankAccount bank-acc-404 not found');
        });

        it('refuses to open a draft for an inactive bank account', async () => {
            store.seedAccount({ isActive: false }, 0);

            const failure = failureOf(await service.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.message).toBe(`Bank account ${TEST_ACCOUNT_ID} is inactive`);
            expect(store.reconciliations.size).toBe(0);
        });

        it('accepts large two-decimal balances', async () => {
            const draft = await openDraft(1234567890.11);

            expect(draft.statementEndingBalance.amountInCents).toBe(123456789011);
        });

        it('rejects an impossible calendar date before touching the store', async () => {
            const failure = failureOf(await service.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: '2024-02-30',
                statementEndingBalance: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [{ field: 'statementDate', message: 'Date must be a valid YYYY-MM-DD calendar date' }]
            });
            expect(store.reconciliations.size).toBe(0);
        });

        it('rejects amounts with fractions of a cent', async () => {
            const failure = failureOf(await service.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 10.005,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [{ field: 'statementEndingBalance', message: 'Amount can have at most 2 decimal places' }]
            });
        });

        it('rolls back and reports a storage failure', async () => {
            store.failingOperations.add('reconciliations.insertDraft');

            const failure = failureOf(await service.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('PERSISTENCE_ERROR');
            expect(failure.details).toEqual({ operation: 'reconciliations.insertDraft' });
            expect(store.reconciliations.size).toBe(0);
            expect(store.committedEvents).toHaveLength(0);
            expect(logger.warn).toHaveBeenCalledWith('Reconciliation operation failed', {
                operation: 'getOrCreateDraft',
                code: 'PERSISTENCE_ERROR',
                message: 'reconciliations.insertDraft failed: connection terminated'
            });
        });
    });

    describe('loadWorkspace', () => {
        it('returns both pools as of the statement date with a fresh summary', async () => {
            store.seedTransaction({ id: 'stmt-1', amount: 4.2, fromStatement: true, date: '2024-03-30' });
            store.seedTransaction({ id: 'sys-1', amount: -60, fromStatement: false, date: '2024-03-01' });
            store.seedTransaction({ id: 'sys-late', amount: 70, fromStatement: false, date: '2024-04-02' });

            const workspace = unwrap(await service.loadWorkspace({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: -55.8,
                actorId: 'clerk-1'
            }));

            expect(workspace.statementItems.map(item => item.id)).toEqual(['stmt-1']);
            expect(workspace.systemItems.map(item => item.id)).toEqual(['sys-1']);
            // book: 0 + 4.20; bank: -55.80 - 60
            expect(workspace.summary.adjustedBookBalance.amount).toBe(4.2);
            expect(workspace.summary.adjustedBankBalance.amount).toBe(-115.8);
            expect(workspace.summary.difference.amount).toBe(-120);
        });
    });

    describe('match', () => {
        let draft: ReconciliationEntity;

        beforeEach(async () => {
            store.seedTransaction({ id: 'stmt-1', amount: 100, fromStatement: true });
            store.seedTransaction({ id: 'sys-1', amount: 99.99, fromStatement: false });
            draft = await openDraft();
        });

        const match = (statementTransactionIds: string[], systemTransactionIds: string[], statementDate = STATEMENT_DATE) =>
            service.match({ draftId: draft.id, statementTransactionIds, systemTransactionIds, statementDate, actorId: 'clerk-1' });

        it('accepts sums that differ by exactly the tolerance', async () => {
            const outcome = unwrap(await match(['stmt-1'], ['sys-1']));

            expect(outcome.reconciliationId).toBe(draft.id);
            expect(store.transaction('stmt-1').reconciliationId).toBe(draft.id);
            expect(store.transaction('sys-1').reconciliationId).toBe(draft.id);
            expect(store.committedEvents.at(-1)?.eventType).toBe('TransactionsMatched');
        });

        it('rejects a statement date other than the draft', async () => {
            const failure = failureOf(await match(['stmt-1'], ['sys-1'], '2024-02-29'));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.message).toBe("Statement date 2024-02-29 does not match the draft's statement date 2024-03-31");
        });

        it('rejects an empty side', async () => {
            const failure = failureOf(await match(['stmt-1'], []));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [{ field: 'systemTransactionIds', message: 'At least one system transaction must be selected' }]
            });
        });

        it('rejects the same id on both sides', async () => {
            const failure = failureOf(await match(['stmt-1'], ['stmt-1']));

            expect(failure.details).toEqual({
                errors: [{ field: 'systemTransactionIds', message: 'A transaction cannot appear on both sides of a match' }]
            });
        });

        it('reports an unknown transaction id', async () => {
            const failure = failureOf(await match(['stmt-1'], ['sys-404']));

            expect(failure.kind).toBe('NOT_FOUND');
            expect(failure.details).toEqual({ resource: 'BankTransaction', id: 'sys-404' });
        });

        it('collects every ineligible item into one validation failure', async () => {
            store.seedAccount({ id: 'bank-acc-2', glAccountId: 'gl-2020' });
            store.seedTransaction({ id: 'foreign-1', amount: 5, fromStatement: false, bankAccountId: 'bank-acc-2' });
            store.seedTransaction({ id: 'late-1', amount: 5, fromStatement: true, date: '2024-04-01' });

            const failure = failureOf(await match(['late-1', 'sys-1'], ['foreign-1', 'stmt-1']));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [
                    { field: 'statementTransactionIds', message: 'Transaction late-1 is dated after the statement date', value: 'late-1' },
                    { field: 'statementTransactionIds', message: 'Transaction sys-1 is not a statement transaction', value: 'sys-1' },
                    { field: 'systemTransactionIds', message: 'Transaction foreign-1 belongs to another bank account', value: 'foreign-1' },
                    { field: 'systemTransactionIds', message: 'Transaction stmt-1 is not a system transaction', value: 'stmt-1' }
                ]
            });
        });

        it('refuses transactions that another draft already claimed', async () => {
            unwrap(await match(['stmt-1'], ['sys-1']));
            const other = await openDraft(0, '2024-04-30');

            const failure = failureOf(await service.match({
                draftId: other.id,
                statementTransactionIds: ['stmt-1'],
                systemTransactionIds: ['sys-1'],
                statementDate: '2024-04-30',
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details.errors).toEqual([
                { field: 'statementTransactionIds', message: 'Transaction stmt-1 is already reconciled', value: 'stmt-1' },
                { field: 'systemTransactionIds', message: 'Transaction sys-1 is already reconciled', value: 'sys-1' }
            ]);
            expect(store.transaction('stmt-1').reconciliationId).toBe(draft.id);
        });

        it('refuses to match into a finalized reconciliation', async () => {
            // earlier than the seeded transactions, so nothing is outstanding
            const closed = await openDraft(0, '2024-01-10');
            unwrap(await service.finalize({
                draftId: closed.id,
                statementEndingBalance: 0,
                bookBalance: 0,
                difference: 0,
                actorId: 'clerk-1'
            }));

            const failure = failureOf(await service.match({
                draftId: closed.id,
                statementTransactionIds: ['stmt-1'],
                systemTransactionIds: ['sys-1'],
                statementDate: '2024-01-10',
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('IMMUTABLE_RECORD');
        });

        it('leaves no claim behind when the batch update fails', async () => {
            store.failingOperations.add('transactions.updateMatchState');

            const failure = failureOf(await match(['stmt-1'], ['sys-1']));

            expect(failure.kind).toBe('PERSISTENCE_ERROR');
            expect(store.transaction('stmt-1').isReconciled).toBe(false);
            expect(store.transaction('sys-1').isReconciled).toBe(false);
            expect(store.committedEvents.map(event => event.eventType)).toEqual(['ReconciliationDraftOpened']);
        });
    });

    describe('previewSelection', () => {
        it('reports sums and balance without claiming anything', async () => {
            store.seedTransaction({ id: 'stmt-1', amount: 300, fromStatement: true });
            store.seedTransaction({ id: 'sys-1', amount: 120, fromStatement: false });
            store.seedTransaction({ id: 'sys-2', amount: 180, fromStatement: false });
            const draft = await openDraft();

            const partial = unwrap(await service.previewSelection({
                draftId: draft.id,
                statementTransactionIds: ['stmt-1'],
                systemTransactionIds: ['sys-1']
            }));
            const full = unwrap(await service.previewSelection({
                draftId: draft.id,
                statementTransactionIds: ['stmt-1'],
                systemTransactionIds: ['sys-1', 'sys-2']
            }));

            expect(partial.difference.amount).toBe(180);
            expect(partial.isBalanced).toBe(false);
            expect(full.systemSum.amount).toBe(300);
            expect(full.isBalanced).toBe(true);
            expect(store.transaction('stmt-1').isReconciled).toBe(false);
        });

        it('never calls an empty selection balanced', async () => {
            const draft = await openDraft();

            const preview = unwrap(await service.previewSelection({
                draftId: draft.id,
                statementTransactionIds: [],
                systemTransactionIds: []
            }));

            expect(preview.difference.isZero()).toBe(true);
            expect(preview.isBalanced).toBe(false);
        });
    });

    describe('unmatch', () => {
        it('releases transactions across drafts with one event per draft', async () => {
            store.seedTransaction({ id: 'stmt-a', amount: 10, fromStatement: true, date: '2024-03-05' });
            store.seedTransaction({ id: 'sys-a', amount: 10, fromStatement: false, date: '2024-03-05' });
            store.seedTransaction({ id: 'stmt-b', amount: 20, fromStatement: true, date: '2024-04-05' });
            store.seedTransaction({ id: 'sys-b', amount: 20, fromStatement: false, date: '2024-04-05' });
            const march = await openDraft(0, '2024-03-31');
            const april = await openDraft(0, '2024-04-30');
            unwrap(await service.match({
                draftId: march.id, statementTransactionIds: ['stmt-a'], systemTransactionIds: ['sys-a'],
                statementDate: '2024-03-31', actorId: 'clerk-1'
            }));
            unwrap(await service.match({
                draftId: april.id, statementTransactionIds: ['stmt-b'], systemTransactionIds: ['sys-b'],
                statementDate: '2024-04-30', actorId: 'clerk-1'
            }));

            const outcome = unwrap(await service.unmatch({ transactionIds: ['sys-a', 'sys-b'], actorId: 'clerk-3' }));

            expect(outcome.reconciliationIds).toEqual([march.id, april.id]);
            expect(store.transaction('sys-a').isReconciled).toBe(false);
            expect(store.transaction('stmt-a').isReconciled).toBe(true);
            const unmatched = store.committedEvents.filter(event => event.eventType === 'TransactionsUnmatched');
            expect(unmatched.map(event => event.aggregateId)).toEqual([march.id, april.id]);
        });

        it('rejects transactions that are not reconciled', async () => {
            store.seedTransaction({ id: 'sys-free', amount: 1, fromStatement: false });

            const failure = failureOf(await service.unmatch({ transactionIds: ['sys-free'], actorId: 'clerk-1' }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.message).toBe('Only reconciled transactions can be unmatched');
        });

        it('rejects duplicate ids', async () => {
            const failure = failureOf(await service.unmatch({ transactionIds: ['a', 'a'], actorId: 'clerk-1' }));

            expect(failure.details).toEqual({ errors: [{ field: 'transactionIds', message: 'Duplicate transaction ids' }] });
        });
    });

    describe('finalize', () => {
        it('re-checks the balance against the store', async () => {
            store.seedTransaction({ id: 'sys-open', amount: 75, fromStatement: false });
            const draft = await openDraft(0);

            const failure = failureOf(await service.finalize({
                draftId: draft.id,
                statementEndingBalance: 0,
                bookBalance: 0,
                difference: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('NOT_BALANCED');
            expect(failure.details).toEqual({
                reconciliationId: draft.id,
                adjustedBookBalance: 0,
                adjustedBankBalance: 75,
                difference: 75,
                tolerance: 0.01
            });
        });

        it('stores the confirmed figures and stamps the bank account', async () => {
            const draft = await openDraft(0);

            const finalized = unwrap(await service.finalize({
                draftId: draft.id,
                statementEndingBalance: 0,
                bookBalance: 0,
                difference: 0,
                actorId: 'clerk-2',
                notes: 'quiet month'
            }));

            expect(finalized.calculatedBookBalance?.amount).toBe(0);
            expect(store.reconciliation(draft.id).notes).toBe('quiet month');
            expect(store.bankAccounts.get(TEST_ACCOUNT_ID)?.lastReconciledDate).toBe(STATEMENT_DATE);
            expect(store.committedEvents.at(-1)?.eventType).toBe('ReconciliationFinalized');
            expect(store.committedEvents.at(-1)?.actorId).toBe('clerk-2');
        });

        it('reports an unknown draft', async () => {
            const failure = failureOf(await service.finalize({
                draftId: 'rec-missing',
                statementEndingBalance: 0,
                bookBalance: 0,
                difference: 0,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('NOT_FOUND');
        });
    });

    describe('bookStatementItem', () => {
        it('posts a two-line entry and adds the matching system transaction', async () => {
            store.seedTransaction({
                id: 'int-1',
                amount: 3.25,
                fromStatement: true,
                type: BankTransactionType.INTEREST,
                description: 'Interest earned',
                reference: 'STMT-0324'
            });
            const draft = await openDraft(3.25);

            const booking = unwrap(await service.bookStatementItem({
                draftId: draft.id,
                statementTransactionId: 'int-1',
                contraGlAccountId: 'gl-4900',
                actorId: 'clerk-1'
            }));

            expect(booking.journalEntryId).toBe('je-1');
            const [entry] = store.journalEntries;
            expect(entry.description).toBe('Entry for statement item: Interest earned');
            expect(entry.options).toEqual({ actorId: 'clerk-1', reference: 'STMT-0324' });
            expect(entry.lines.map(line => [line.glAccountId, line.debit.amount, line.credit.amount])).toEqual([
                [TEST_GL_ACCOUNT_ID, 3.25, 0],
                ['gl-4900', 0, 3.25]
            ]);

            const created = store.transaction(booking.systemTransaction.id);
            expect(created).toMatchObject({
                isFromStatement: false,
                isReconciled: false,
                transactionType: BankTransactionType.INTEREST,
                description: 'Bank Rec: Interest earned',
                journalEntryId: 'je-1',
                transactionDate: '2024-01-15'
            });
            expect(created.amount.amount).toBe(3.25);
        });

        it('types an item whose recorded type disagrees with its sign from the amount', async () => {
            store.seedTransaction({ id: 'odd-1', amount: -8, fromStatement: true, type: BankTransactionType.DEPOSIT });
            const draft = await openDraft();

            const booking = unwrap(await service.bookStatementItem({
                draftId: draft.id,
                statementTransactionId: 'odd-1',
                contraGlAccountId: 'gl-6100',
                actorId: 'clerk-1',
                description: 'Wire fee'
            }));

            expect(booking.systemTransaction.transactionType).toBe(BankTransactionType.FEE);
            expect(booking.systemTransaction.description).toBe('Wire fee');
        });

        it('refuses system items and the bank account as its own contra', async () => {
            store.seedTransaction({ id: 'sys-1', amount: 5, fromStatement: false });
            const draft = await openDraft();

            const failure = failureOf(await service.bookStatementItem({
                draftId: draft.id,
                statementTransactionId: 'sys-1',
                contraGlAccountId: TEST_GL_ACCOUNT_ID,
                actorId: 'clerk-1'
            }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [
                    { field: 'statementTransactionId', message: 'Only statement transactions can be booked', value: 'sys-1' },
                    {
                        field: 'contraGlAccountId',
                        message: "Contra account cannot be the bank account's own GL account",
                        value: TEST_GL_ACCOUNT_ID
                    }
                ]
            });
            expect(store.journalEntries).toHaveLength(0);
        });
    });

    describe('listHistory', () => {
        const finalizeMonth = async (statementDate: string) => {
            const draft = await openDraft(0, statementDate);
            unwrap(await service.finalize({
                draftId: draft.id,
                statementEndingBalance: 0,
                bookBalance: 0,
                difference: 0,
                actorId: 'clerk-1'
            }));
            return draft.id;
        };

        it('lists finalized reconciliations newest first, skipping open drafts', async () => {
            await finalizeMonth('2024-01-31');
            const february = await finalizeMonth('2024-02-29');
            await openDraft(0, '2024-03-31');

            const history = unwrap(await service.listHistory({ bankAccountId: TEST_ACCOUNT_ID, page: 1, pageSize: 1 }));

            expect(history.data.map(item => item.id)).toEqual([february]);
            expect(history.pagination).toEqual({
                total: 2,
                page: 1,
                pageSize: 1,
                totalPages: 2,
                hasNext: true,
                hasPrev: false
            });
        });

        it('rejects a page size above the configured maximum', async () => {
            const failure = failureOf(await service.listHistory({ bankAccountId: TEST_ACCOUNT_ID, pageSize: 51 }));

            expect(failure.kind).toBe('VALIDATION_ERROR');
            expect(failure.details).toEqual({
                errors: [{ field: 'pageSize', message: 'Page size cannot exceed 50', value: 51 }]
            });
        });
    });

    describe('getItemsForReconciliation', () => {
        it('splits the claimed transactions by source', async () => {
            store.seedTransaction({ id: 'stmt-1', amount: 42, fromStatement: true });
            store.seedTransaction({ id: 'sys-1', amount: 42, fromStatement: false });
            const draft = await openDraft();
            unwrap(await service.match({
                draftId: draft.id, statementTransactionIds: ['stmt-1'], systemTransactionIds: ['sys-1'],
                statementDate: STATEMENT_DATE, actorId: 'clerk-1'
            }));

            const items = unwrap(await service.getItemsForReconciliation(draft.id));

            expect(items.statementItems.map(item => item.id)).toEqual(['stmt-1']);
            expect(items.systemItems.map(item => item.id)).toEqual(['sys-1']);
        });

        it('reports an unknown reconciliation', async () => {
            const failure = failureOf(await service.getItemsForReconciliation('rec-missing'));

            expect(failure).toMatchObject({ kind: 'NOT_FOUND', message: 'Reconciliation rec-missing not found' });
        });
    });

    describe('error channels', () => {
        it('rethrows unexpected errors instead of returning them', async () => {
            const broken: IUnitOfWorkFactory = {
                execute: async () => {
                    throw new TypeError('cannot read properties of undefined');
                },
                read: async () => {
                    throw new TypeError('cannot read properties of undefined');
                }
            };
            const brokenService = new BankReconciliationApplicationService(broken, SETTINGS);

            await expect(brokenService.unmatch({ transactionIds: ['tx-1'], actorId: 'clerk-1' }))
                .rejects.toThrow(TypeError);
            expect(logger.error).toHaveBeenCalledWith(
                'Unexpected error in reconciliation operation',
                expect.any(TypeError),
                { operation: 'unmatch' }
            );
        });

        it('dispatches committed events to registered handlers', async () => {
            const dispatcher = new EventDispatcher();
            const handled: string[] = [];
            dispatcher.register({
                canHandle: (event: BaseDomainEvent): event is BaseDomainEvent => true,
                handle: async event => {
                    handled.push(event.eventType);
                }
            });
            const dispatchingStore = new InMemoryReconciliationStore(dispatcher);
            dispatchingStore.seedAccount({}, 0);
            const dispatchingService = new BankReconciliationApplicationService(dispatchingStore, SETTINGS);

            unwrap(await dispatchingService.getOrCreateDraft({
                bankAccountId: TEST_ACCOUNT_ID,
                statementDate: STATEMENT_DATE,
                statementEndingBalance: 0,
                actorId: 'clerk-1'
            }));

            expect(handled).toEqual(['ReconciliationDraftOpened']);
        });
    });
});

import {randomUUID} from 'crypto';
import {Mutex, withTimeout, type MutexInterface} from 'async-mutex';
import * as sqlite from 'sqlite';
import sqlite3 from 'sqlite3';
import sql, {type SQLStatement} from 'sql-template-strings';
import {StoreUnavailable} from '../lib/errors';
import logger from '../lib/logger';
import {withDeadline} from './deadline';
import type {LedgerStore} from './store';
import type {
	AccrualFilter,
	Challenge,
	Hint,
	HintUnlock,
	HintUnlockDraft,
	HintUnlockFilter,
	KothAccrual,
	KothClaim,
	KothTarget,
	KothTransition,
	KothTransitionResult,
	RecordSubmissionResult,
	Submission,
	SubmissionDraft,
	SubmissionFilter,
	SubmissionOutcome,
	Team,
} from './types';

const log = logger.child({bot: 'ledger/sqlite'});

const schema = [
	`CREATE TABLE IF NOT EXISTS challenges (
		id TEXT PRIMARY KEY,
		title TEXT NOT NULL,
		category TEXT NOT NULL,
		value INTEGER NOT NULL,
		flag TEXT NOT NULL,
		case_sensitive INTEGER NOT NULL,
		hidden INTEGER NOT NULL,
		retired INTEGER NOT NULL
	)`,
	`CREATE TABLE IF NOT EXISTS hints (
		id TEXT PRIMARY KEY,
		challenge_id TEXT NOT NULL,
		cost INTEGER NOT NULL,
		rank INTEGER NOT NULL,
		text TEXT NOT NULL
	)`,
	`CREATE TABLE IF NOT EXISTS teams (
		id TEXT PRIMARY KEY,
		name TEXT NOT NULL,
		members TEXT NOT NULL,
		affiliation TEXT NOT NULL,
		registered_at INTEGER NOT NULL
	)`,
	`CREATE TABLE IF NOT EXISTS koth_targets (
		id TEXT PRIMARY KEY,
		name TEXT NOT NULL,
		challenge_id TEXT,
		capture_rule TEXT NOT NULL,
		proof TEXT NOT NULL,
		accrual_points INTEGER NOT NULL,
		accrual_unit_ms INTEGER NOT NULL
	)`,
	`CREATE TABLE IF NOT EXISTS submissions (
		seq INTEGER PRIMARY KEY AUTOINCREMENT,
		id TEXT NOT NULL UNIQUE,
		team_id TEXT NOT NULL,
		challenge_id TEXT NOT NULL,
		user_id TEXT,
		text TEXT NOT NULL,
		submitted_at INTEGER NOT NULL,
		outcome TEXT NOT NULL,
		value INTEGER NOT NULL
	)`,
	// At most one award per (team, challenge)
	`CREATE UNIQUE INDEX IF NOT EXISTS submissions_award
		ON submissions (team_id, challenge_id) WHERE outcome = 'correct'`,
	`CREATE TABLE IF NOT EXISTS hint_unlocks (
		seq INTEGER PRIMARY KEY AUTOINCREMENT,
		id TEXT NOT NULL UNIQUE,
		team_id TEXT NOT NULL,
		hint_id TEXT NOT NULL,
		challenge_id TEXT NOT NULL,
		cost INTEGER NOT NULL,
		unlocked_at INTEGER NOT NULL,
		UNIQUE (team_id, hint_id)
	)`,
	`CREATE TABLE IF NOT EXISTS koth_claims (
		seq INTEGER PRIMARY KEY AUTOINCREMENT,
		id TEXT NOT NULL UNIQUE,
		target_id TEXT NOT NULL,
		team_id TEXT NOT NULL,
		claimed_at INTEGER NOT NULL,
		released_at INTEGER
	)`,
	// At most one open claim per target
	`CREATE UNIQUE INDEX IF NOT EXISTS koth_claims_open
		ON koth_claims (target_id) WHERE released_at IS NULL`,
	`CREATE TABLE IF NOT EXISTS koth_accruals (
		seq INTEGER PRIMARY KEY AUTOINCREMENT,
		id TEXT NOT NULL UNIQUE,
		target_id TEXT NOT NULL,
		team_id TEXT NOT NULL,
		claim_id TEXT NOT NULL,
		points INTEGER NOT NULL,
		credited_at INTEGER NOT NULL
	)`,
];

interface ChallengeRow {
	id: string,
	title: string,
	category: string,
	value: number,
	flag: string,
	case_sensitive: number,
	hidden: number,
	retired: number,
}

interface HintRow {
	id: string,
	challenge_id: string,
	cost: number,
	rank: number,
	text: string,
}

interface TeamRow {
	id: string,
	name: string,
	members: string,
	affiliation: string,
	registered_at: number,
}

interface KothTargetRow {
	id: string,
	name: string,
	challenge_id: string | null,
	capture_rule: string,
	proof: string,
	accrual_points: number,
	accrual_unit_ms: number,
}

interface SubmissionRow {
	id: string,
	team_id: string,
	challenge_id: string,
	user_id: string | null,
	text: string,
	submitted_at: number,
	outcome: string,
	value: number,
}

interface HintUnlockRow {
	id: string,
	team_id: string,
	hint_id: string,
	challenge_id: string,
	cost: number,
	unlocked_at: number,
}

interface KothClaimRow {
	id: string,
	target_id: string,
	team_id: string,
	claimed_at: number,
	released_at: number | null,
}

interface KothAccrualRow {
	id: string,
	target_id: string,
	team_id: string,
	claim_id: string,
	points: number,
	credited_at: number,
}

const toOutcome = (outcome: string): SubmissionOutcome => {
	if (outcome === 'correct' || outcome === 'incorrect' || outcome === 'duplicate') {
		return outcome;
	}
	throw new Error(`Unknown submission outcome ${outcome}`);
};

const toMembers = (members: string): string[] => {
	const parsed: unknown = JSON.parse(members);
	if (!Array.isArray(parsed) || !parsed.every((member): member is string => typeof member === 'string')) {
		throw new Error(`Malformed team roster ${members}`);
	}
	return parsed;
};

const fromChallengeRow = (row: ChallengeRow): Challenge => ({
	id: row.id,
	title: row.title,
	category: row.category,
	value: row.value,
	flag: row.flag,
	caseSensitive: row.case_sensitive === 1,
	hidden: row.hidden === 1,
	retired: row.retired === 1,
});

const fromHintRow = (row: HintRow): Hint => ({
	id: row.id,
	challengeId: row.challenge_id,
	cost: row.cost,
	rank: row.rank,
	text: row.text,
});

const fromTeamRow = (row: TeamRow): Team => ({
	id: row.id,
	name: row.name,
	members: toMembers(row.members),
	affiliation: row.affiliation,
	registeredAt: new Date(row.registered_at),
});

const fromKothTargetRow = (row: KothTargetRow): KothTarget => ({
	id: row.id,
	name: row.name,
	challengeId: row.challenge_id,
	captureRule: row.capture_rule === 'proof' ? 'proof' : 'open',
	proof: row.proof,
	accrualPoints: row.accrual_points,
	accrualUnitMs: row.accrual_unit_ms,
});

const fromSubmissionRow = (row: SubmissionRow): Submission => ({
	id: row.id,
	teamId: row.team_id,
	challengeId: row.challenge_id,
	userId: row.user_id,
	text: row.text,
	submittedAt: new Date(row.submitted_at),
	outcome: toOutcome(row.outcome),
	value: row.value,
});

const fromHintUnlockRow = (row: HintUnlockRow): HintUnlock => ({
	id: row.id,
	teamId: row.team_id,
	hintId: row.hint_id,
	challengeId: row.challenge_id,
	cost: row.cost,
	unlockedAt: new Date(row.unlocked_at),
});

const fromKothClaimRow = (row: KothClaimRow): KothClaim => ({
	id: row.id,
	targetId: row.target_id,
	teamId: row.team_id,
	claimedAt: new Date(row.claimed_at),
	releasedAt: row.released_at === null ? null : new Date(row.released_at),
});

const fromKothAccrualRow = (row: KothAccrualRow): KothAccrual => ({
	id: row.id,
	targetId: row.target_id,
	teamId: row.team_id,
	claimId: row.claim_id,
	points: row.points,
	creditedAt: new Date(row.credited_at),
});

type Connection = sqlite.Database<sqlite3.Database, sqlite3.Statement>;

/**
 * SQLite を用いた永続的な台帳。production 環境で用いる。
 *
 * 一意性は部分インデックスで保証し、INSERT ... ON CONFLICT DO NOTHING の changes で勝者を判定する。
 * 接続は1本なので、トランザクションが他の呼び出しの文を巻き込まないよう接続ごとの Mutex で直列化する。
 */
export class SqliteLedgerStore implements LedgerStore {
	#db: Connection;
	#connection: MutexInterface;
	#timeoutMs: number;

	static async create({filename, timeoutMs = 5000}: {filename: string, timeoutMs?: number}) {
		const db = await sqlite.open({
			filename,
			driver: sqlite3.Database,
		});
		await db.run(`PRAGMA busy_timeout = ${Math.floor(timeoutMs)}`);
		for (const statement of schema) {
			await db.run(statement);
		}
		log.info(`SQLite ledger opened at ${filename}`);
		return new SqliteLedgerStore(db, timeoutMs);
	}

	constructor(db: Connection, timeoutMs: number) {
		this.#db = db;
		this.#timeoutMs = timeoutMs;
		this.#connection = withTimeout(
			new Mutex(),
			timeoutMs,
			new StoreUnavailable('Timed out waiting for the ledger connection', 'failed'),
		);
	}

	async putChallenge(challenge: Challenge) {
		await this.#run('putChallenge', sql`
			INSERT OR REPLACE INTO challenges (id, title, category, value, flag, case_sensitive, hidden, retired)
			VALUES (
				${challenge.id},
				${challenge.title},
				${challenge.category},
				${challenge.value},
				${challenge.flag},
				${challenge.caseSensitive ? 1 : 0},
				${challenge.hidden ? 1 : 0},
				${challenge.retired ? 1 : 0}
			)
		`);
	}

	async putHint(hint: Hint) {
		await this.#run('putHint', sql`
			INSERT OR REPLACE INTO hints (id, challenge_id, cost, rank, text)
			VALUES (${hint.id}, ${hint.challengeId}, ${hint.cost}, ${hint.rank}, ${hint.text})
		`);
	}

	async putTeam(team: Team) {
		await this.#run('putTeam', sql`
			INSERT OR REPLACE INTO teams (id, name, members, affiliation, registered_at)
			VALUES (
				${team.id},
				${team.name},
				${JSON.stringify(team.members)},
				${team.affiliation},
				${team.registeredAt.getTime()}
			)
		`);
	}

	async putKothTarget(target: KothTarget) {
		await this.#run('putKothTarget', sql`
			INSERT OR REPLACE INTO koth_targets (id, name, challenge_id, capture_rule, proof, accrual_points, accrual_unit_ms)
			VALUES (
				${target.id},
				${target.name},
				${target.challengeId},
				${target.captureRule},
				${target.proof},
				${target.accrualPoints},
				${target.accrualUnitMs}
			)
		`);
	}

	async getChallenge(id: string) {
		const row = await this.#get<ChallengeRow>('getChallenge', sql`SELECT * FROM challenges WHERE id = ${id}`);
		return row === undefined ? null : fromChallengeRow(row);
	}

	async getHint(id: string) {
		const row = await this.#get<HintRow>('getHint', sql`SELECT * FROM hints WHERE id = ${id}`);
		return row === undefined ? null : fromHintRow(row);
	}

	async getTeam(id: string) {
		const row = await this.#get<TeamRow>('getTeam', sql`SELECT * FROM teams WHERE id = ${id}`);
		return row === undefined ? null : fromTeamRow(row);
	}

	async getKothTarget(id: string) {
		const row = await this.#get<KothTargetRow>('getKothTarget', sql`SELECT * FROM koth_targets WHERE id = ${id}`);
		return row === undefined ? null : fromKothTargetRow(row);
	}

	async listTeams() {
		const rows = await this.#all<TeamRow>('listTeams', sql`SELECT * FROM teams ORDER BY id`);
		return rows.map(fromTeamRow);
	}

	async listHints(challengeId: string) {
		const rows = await this.#all<HintRow>('listHints', sql`
			SELECT * FROM hints WHERE challenge_id = ${challengeId} ORDER BY rank, id
		`);
		return rows.map(fromHintRow);
	}

	async listKothTargets() {
		const rows = await this.#all<KothTargetRow>('listKothTargets', sql`SELECT * FROM koth_targets ORDER BY id`);
		return rows.map(fromKothTargetRow);
	}

	async recordSubmission(draft: SubmissionDraft): Promise<RecordSubmissionResult> {
		if (draft.outcome === 'correct') {
			const submission: Submission = {id: randomUUID(), ...draft};
			const {changes} = await this.#run('recordSubmission', this.#insertSubmission(submission, true));
			if (changes === 1) {
				return {awarded: true, submission};
			}
		}

		const submission: Submission = {
			id: randomUUID(),
			...draft,
			outcome: draft.outcome === 'correct' ? 'duplicate' : draft.outcome,
			value: 0,
		};
		await this.#run('recordSubmission', this.#insertSubmission(submission, false));
		return {awarded: false, submission};
	}

	async insertHintUnlock(draft: HintUnlockDraft) {
		const hintUnlock: HintUnlock = {id: randomUUID(), ...draft};
		const {changes} = await this.#run('insertHintUnlock', sql`
			INSERT INTO hint_unlocks (id, team_id, hint_id, challenge_id, cost, unlocked_at)
			VALUES (
				${hintUnlock.id},
				${hintUnlock.teamId},
				${hintUnlock.hintId},
				${hintUnlock.challengeId},
				${hintUnlock.cost},
				${hintUnlock.unlockedAt.getTime()}
			)
			ON CONFLICT DO NOTHING
		`);
		return changes === 1 ? hintUnlock : null;
	}

	compareAndSwapKoth(transition: KothTransition): Promise<KothTransitionResult> {
		return this.#exclusive('compareAndSwapKoth', async (db) => {
			await db.run('BEGIN IMMEDIATE');
			try {
				const result = await this.#applyTransition(db, transition);
				await db.run(result.ok ? 'COMMIT' : 'ROLLBACK');
				return result;
			} catch (error) {
				await db.run('ROLLBACK');
				throw error;
			}
		});
	}

	async listSubmissions(filter: SubmissionFilter = {}) {
		const query = sql`SELECT * FROM submissions WHERE 1 = 1`;
		if (filter.teamId !== undefined) {
			query.append(sql` AND team_id = ${filter.teamId}`);
		}
		if (filter.challengeId !== undefined) {
			query.append(sql` AND challenge_id = ${filter.challengeId}`);
		}
		if (filter.outcome !== undefined) {
			query.append(sql` AND outcome = ${filter.outcome}`);
		}
		query.append(' ORDER BY seq');
		const rows = await this.#all<SubmissionRow>('listSubmissions', query);
		return rows.map(fromSubmissionRow);
	}

	async listHintUnlocks(filter: HintUnlockFilter = {}) {
		const query = sql`SELECT * FROM hint_unlocks WHERE 1 = 1`;
		if (filter.teamId !== undefined) {
			query.append(sql` AND team_id = ${filter.teamId}`);
		}
		if (filter.challengeId !== undefined) {
			query.append(sql` AND challenge_id = ${filter.challengeId}`);
		}
		query.append(' ORDER BY seq');
		const rows = await this.#all<HintUnlockRow>('listHintUnlocks', query);
		return rows.map(fromHintUnlockRow);
	}

	async listAccruals(filter: AccrualFilter = {}) {
		const query = sql`SELECT * FROM koth_accruals WHERE 1 = 1`;
		if (filter.teamId !== undefined) {
			query.append(sql` AND team_id = ${filter.teamId}`);
		}
		if (filter.targetId !== undefined) {
			query.append(sql` AND target_id = ${filter.targetId}`);
		}
		if (filter.claimId !== undefined) {
			query.append(sql` AND claim_id = ${filter.claimId}`);
		}
		query.append(' ORDER BY seq');
		const rows = await this.#all<KothAccrualRow>('listAccruals', query);
		return rows.map(fromKothAccrualRow);
	}

	async openClaim(targetId: string) {
		const row = await this.#get<KothClaimRow>('openClaim', sql`
			SELECT * FROM koth_claims WHERE target_id = ${targetId} AND released_at IS NULL
		`);
		return row === undefined ? null : fromKothClaimRow(row);
	}

	async listClaims(targetId: string) {
		const rows = await this.#all<KothClaimRow>('listClaims', sql`
			SELECT * FROM koth_claims WHERE target_id = ${targetId} ORDER BY seq
		`);
		return rows.map(fromKothClaimRow);
	}

	async close() {
		await this.#connection.runExclusive(() => this.#db.close());
		log.info('SQLite ledger closed');
	}

	async #applyTransition(db: Connection, transition: KothTransition): Promise<KothTransitionResult> {
		const currentRow = await db.get<KothClaimRow>(sql`
			SELECT * FROM koth_claims WHERE target_id = ${transition.targetId} AND released_at IS NULL
		`);
		const current = currentRow === undefined ? null : fromKothClaimRow(currentRow);

		if ((current?.id ?? null) !== transition.expectedClaimId) {
			return {ok: false, current};
		}
		if (current !== null && transition.expectedCredited !== undefined) {
			const row = await db.get<{credited: number}>(sql`
				SELECT COALESCE(SUM(points), 0) AS credited FROM koth_accruals WHERE claim_id = ${current.id}
			`);
			if ((row?.credited ?? 0) !== transition.expectedCredited) {
				return {ok: false, current};
			}
		}
		if (transition.open && current !== null && !transition.release) {
			throw new Error(`Target ${transition.targetId} already has an open claim`);
		}
		if (transition.release && current === null) {
			throw new Error(`Target ${transition.targetId} has no open claim to release`);
		}

		let accrual: KothAccrual | null = null;
		if (transition.accrual && transition.accrual.points > 0) {
			accrual = {id: randomUUID(), targetId: transition.targetId, ...transition.accrual};
			await db.run(sql`
				INSERT INTO koth_accruals (id, target_id, team_id, claim_id, points, credited_at)
				VALUES (
					${accrual.id},
					${accrual.targetId},
					${accrual.teamId},
					${accrual.claimId},
					${accrual.points},
					${accrual.creditedAt.getTime()}
				)
			`);
		}

		let released: KothClaim | null = null;
		if (transition.release && current !== null) {
			await db.run(sql`
				UPDATE koth_claims SET released_at = ${transition.release.at.getTime()}
				WHERE id = ${current.id} AND released_at IS NULL
			`);
			released = {...current, releasedAt: new Date(transition.release.at)};
		}

		let claim: KothClaim | null = released === null ? current : null;
		if (transition.open) {
			claim = {
				id: randomUUID(),
				targetId: transition.targetId,
				teamId: transition.open.teamId,
				claimedAt: new Date(transition.open.at),
				releasedAt: null,
			};
			await db.run(sql`
				INSERT INTO koth_claims (id, target_id, team_id, claimed_at, released_at)
				VALUES (${claim.id}, ${claim.targetId}, ${claim.teamId}, ${claim.claimedAt.getTime()}, NULL)
			`);
		}

		return {ok: true, claim, released, accrual};
	}

	#insertSubmission(submission: Submission, conditional: boolean) {
		const statement = sql`
			INSERT INTO submissions (id, team_id, challenge_id, user_id, text, submitted_at, outcome, value)
			VALUES (
				${submission.id},
				${submission.teamId},
				${submission.challengeId},
				${submission.userId},
				${submission.text},
				${submission.submittedAt.getTime()},
				${submission.outcome},
				${submission.value}
			)
		`;
		if (conditional) {
			statement.append(' ON CONFLICT DO NOTHING');
		}
		return statement;
	}

	#exclusive<T>(operation: string, work: (db: Connection) => Promise<T>): Promise<T> {
		return withDeadline(
			this.#connection.runExclusive(() => work(this.#db)),
			this.#timeoutMs,
			operation,
		);
	}

	#run(operation: string, statement: SQLStatement) {
		return this.#exclusive(operation, (db) => db.run(statement));
	}

	#get<Row>(operation: string, statement: SQLStatement) {
		return this.#exclusive(operation, (db) => db.get<Row>(statement));
	}

	#all<Row>(operation: string, statement: SQLStatement) {
		return this.#exclusive(operation, (db) => db.all<Row[]>(statement));
	}
}

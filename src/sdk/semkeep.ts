/**
 * Semkeep facade.
 *
 * The one object callers need: record changes, cut releases, render the
 * changelog, inspect status. Wraps the core modules for one project root.
 */
import path from 'node:path';

import type { SemkeepConfig } from '../core/config/index.js';
import { resolveLayout, type Layout } from '../core/layout.js';
import { ChangesetStore, type Changeset } from '../core/changeset/index.js';
import {
    ReleaseCoordinator,
    ReleaseHistory,
    type Release,
    type ReleaseStatus,
} from '../core/release/index.js';
import { generateChangelog, loadTemplate } from '../core/changelog/index.js';
import type { ReleaseType } from '../core/version/index.js';

import type { AddChangeOptions, GenerateChangelogOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Semkeep Class
// ─────────────────────────────────────────────────────────────

/**
 * @example
 * ```typescript
 * const semkeep = await createSemkeep({ path: '/repo' })
 *
 * await semkeep.addChange('minor', 'Add --json flag')
 * await semkeep.getNextVersion()   // '1.1.0'
 *
 * const release = await semkeep.release()
 * const changelog = await semkeep.generateChangelog()
 * ```
 */
export class Semkeep {

    #config: SemkeepConfig;
    #layout: Layout;
    #store: ChangesetStore;
    #history: ReleaseHistory;
    #coordinator: ReleaseCoordinator;

    constructor(root: string, config: SemkeepConfig) {

        this.#config = config;
        this.#layout = resolveLayout(root);
        this.#store = new ChangesetStore(this.#layout);
        this.#history = new ReleaseHistory(this.#layout);
        this.#coordinator = new ReleaseCoordinator(this.#store, this.#history);

    }

    // ─────────────────────────────────────────────────────────
    // Read-only Properties
    // ─────────────────────────────────────────────────────────

    get root(): string {

        return this.#layout.root;

    }

    get config(): SemkeepConfig {

        return this.#config;

    }

    get layout(): Layout {

        return this.#layout;

    }

    /**
     * Whether the project still uses the deprecated `.changes` directory.
     */
    isDeprecated(): boolean {

        return this.#store.isUsingLegacyLayout();

    }

    // ─────────────────────────────────────────────────────────
    // Changesets
    // ─────────────────────────────────────────────────────────

    /**
     * Record a pending change.
     *
     * @returns Absolute path of the changeset file
     * @throws InvalidChangesetError if the description is blank
     */
    async addChange(
        type: ReleaseType,
        description: string,
        options: AddChangeOptions = {},
    ): Promise<string> {

        const changeset: Changeset = {
            type,
            description,
            ...(options.attributes ? { attributes: options.attributes } : {}),
            ...(options.pre ? { pre: options.pre } : {}),
        };

        return this.#store.create(changeset);

    }

    /**
     * Whether anything is waiting to be released.
     */
    async check(): Promise<boolean> {

        return this.#coordinator.check();

    }

    // ─────────────────────────────────────────────────────────
    // Versions
    // ─────────────────────────────────────────────────────────

    /**
     * Current version, `0.0.0` before the first release.
     */
    async getLastVersion(): Promise<string> {

        const version = await this.#coordinator.currentVersion();

        return version.toString();

    }

    /**
     * Version the pending changes would produce, or null when none are pending.
     *
     * @throws MixedChangesetsError if stable and prerelease changes are pending together
     */
    async getNextVersion(): Promise<string | null> {

        const next = await this.#coordinator.nextVersion();

        return next.status === 'pending' ? next.version.toString() : null;

    }

    async getStatus(): Promise<ReleaseStatus> {

        return this.#coordinator.status();

    }

    /**
     * Turn the pending changes into a release.
     *
     * @throws MissingChangesetError if nothing is pending
     */
    async release(): Promise<Release> {

        return this.#coordinator.release();

    }

    // ─────────────────────────────────────────────────────────
    // Changelog
    // ─────────────────────────────────────────────────────────

    /**
     * Render the changelog for every release, or one version.
     *
     * @throws TemplateNotFoundError if the configured template file is missing
     * @throws TemplateError if the template fails
     */
    async generateChangelog(options: GenerateChangelogOptions = {}): Promise<string> {

        const configured = this.#config.changelog.template;
        const template = options.template
            ?? (configured ? await loadTemplate(path.resolve(this.root, configured)) : undefined);

        const releases = await this.#history.list();

        return generateChangelog(releases, {
            ...(options.version !== undefined ? { version: options.version } : {}),
            ...(template !== undefined ? { template } : {}),
        });

    }

}

/**
 * Profile Switch Controller
 *
 * State machine over a user's active profile:
 *
 *   unset ──switchProfile(p)──▶ active(p) ──switchProfile(q)──▶ active(q)
 *     ▲                             │
 *     └──── last role under p revoked (Membership Store) ◀──┘
 *
 * Every user starts unset. Assigning roles never leaves unset; only an
 * explicit switch does. There is no terminal state.
 */

import { Catalog } from '../catalog/catalog.js';
import type { Profile, ProfileId, UserId } from '../catalog/types.js';
import { NoRoleInProfileError } from '../errors/accessErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { MembershipStore } from '../membership/store.js';

const logger = getComponentLogger('ProfileSwitchController');

export type ProfileState =
    | { readonly kind: 'unset' }
    | { readonly kind: 'active'; readonly profile: ProfileId };

const UNSET: ProfileState = Object.freeze({ kind: 'unset' });

export class ProfileSwitchController {
    constructor(
        private readonly catalog: Catalog,
        private readonly memberships: MembershipStore
    ) { }

    stateOf(userId: UserId): ProfileState {
        const profile = this.memberships.activeProfileOf(userId);
        return profile === null ? UNSET : Object.freeze({ kind: 'active', profile });
    }

    /**
     * Confirm a switch is legal without performing it.
     * @throws NoRoleInProfileError
     */
    assertCanSwitch(userId: UserId, target: ProfileId): void {
        if (!this.memberships.profilesFor(userId).has(target)) {
            throw new NoRoleInProfileError(userId, target);
        }
    }

    /**
     * Make `target` the active profile. On failure the state is unchanged.
     * @throws NoRoleInProfileError if the user holds no role under `target`
     */
    switchProfile(userId: UserId, target: ProfileId): ProfileState {
        const from = this.stateOf(userId);

        try {
            this.assertCanSwitch(userId, target);
        } catch (error) {
            logger.warn({ userId, target, from: from.kind }, 'Profile switch rejected');
            throw error;
        }

        this.memberships.setActiveProfile(userId, target);
        const to = this.stateOf(userId);

        logger.info({
            userId,
            from: from.kind === 'active' ? from.profile : null,
            to: target
        }, 'Active profile switched');

        return to;
    }

    /**
     * Catalog profiles the user can switch to, for navigation choices.
     */
    switchCandidates(userId: UserId): Profile[] {
        const held = this.memberships.profilesFor(userId);
        return this.catalog.listProfiles().filter(profile => held.has(profile.id));
    }
}

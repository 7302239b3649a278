import { cloneDeep, times } from 'lodash';
import * as td from 'testdouble';

import { readDatafile } from '../test/testHelpers';

import { Bucketer, DeterministicSharder } from './bucketer';
import { ConfigIndex } from './config-index';
import { DecisionService, DecisionSource } from './decision-service';
import { MemoryForcedVariationStore } from './forced-variation-store';
import { Datafile, ExperimentDto } from './interfaces';
import { Attributes } from './types';
import { IUserProfileService, MemoryUserProfileService } from './user-profile-service';

function smallDatafile(allocation: [string, number][]): Datafile {
  const experiment: ExperimentDto = {
    id: 'exp1',
    key: 'exp',
    status: 'Running',
    audienceIds: [],
    variations: [
      { id: '1', key: 'A' },
      { id: '2', key: 'B' },
      { id: '3', key: 'C' },
    ],
    trafficAllocation: allocation.map(([entityId, endOfRange]) => ({ entityId, endOfRange })),
  };
  return { version: '4', revision: '1', experiments: [experiment] };
}

describe('DecisionService', () => {
  describe('with fixed bucket values', () => {
    const sharder = new DeterministicSharder({
      user1exp1: 3000,
      user2exp1: 7000,
      user3exp1: 9000,
      user4exp1: 4500,
    });
    const config = new ConfigIndex(
      smallDatafile([
        ['1', 5000],
        ['2', 8000],
      ]),
    );

    it('buckets by the allocation table', () => {
      const service = new DecisionService({ bucketer: new Bucketer(sharder) });
      expect(service.decideExperiment(config, 'exp', 'user1')?.variation.key).toBe('A');
      expect(service.decideExperiment(config, 'exp', 'user2')?.variation.key).toBe('B');
      expect(service.decideExperiment(config, 'exp', 'user3')).toBeNull();
    });

    it('returns frozen experiment decisions', () => {
      const service = new DecisionService({ bucketer: new Bucketer(sharder) });
      const decision = service.decideExperiment(config, 'exp', 'user1');
      expect(decision?.source).toBe(DecisionSource.EXPERIMENT);
      expect(decision?.experiment.key).toBe('exp');
      expect(Object.isFrozen(decision)).toBe(true);
    });

    it('keeps a stored variation after the allocation changes', () => {
      const userProfileService = new MemoryUserProfileService();
      const service = new DecisionService({ bucketer: new Bucketer(sharder), userProfileService });
      expect(service.decideExperiment(config, 'exp', 'user2')?.variation.id).toBe('2');
      expect(userProfileService.lookup('user2')).toEqual({ exp1: '2' });

      const reallocated = new ConfigIndex(
        smallDatafile([
          ['1', 2000],
          ['3', 10000],
        ]),
      );
      expect(service.decideExperiment(reallocated, 'exp', 'user2')?.variation.id).toBe('2');

      const withoutProfiles = new DecisionService({ bucketer: new Bucketer(sharder) });
      expect(withoutProfiles.decideExperiment(reallocated, 'exp', 'user2')?.variation.id).toBe('3');
    });

    it('re-buckets when the stored variation no longer exists', () => {
      const userProfileService = new MemoryUserProfileService();
      userProfileService.save('user4', 'exp1', 'gone');
      const service = new DecisionService({ bucketer: new Bucketer(sharder), userProfileService });
      expect(service.decideExperiment(config, 'exp', 'user4')?.variation.id).toBe('1');
      expect(userProfileService.lookup('user4')).toEqual({ exp1: '1' });
    });

    it('ignores a bucket that points at an unknown variation', () => {
      const service = new DecisionService({ bucketer: new Bucketer(sharder) });
      const unknown = new ConfigIndex(smallDatafile([['999', 10000]]));
      expect(service.decideExperiment(unknown, 'exp', 'user1')).toBeNull();
    });
  });

  describe('with the fixture datafile', () => {
    const datafile = readDatafile();
    const config = new ConfigIndex(datafile);
    let forcedVariationStore: MemoryForcedVariationStore;
    let service: DecisionService;

    beforeEach(() => {
      forcedVariationStore = new MemoryForcedVariationStore();
      service = new DecisionService({ forcedVariationStore });
    });

    function variationKey(experimentKey: string, userId: string, attributes: Attributes = {}) {
      return (
        service.decideExperiment(config, experimentKey, userId, attributes)?.variation.key ?? null
      );
    }

    describe('decideExperiment', () => {
      it('buckets users by hashing the user id and experiment id', () => {
        expect(variationKey('test_experiment', 'user4')).toBe('control');
        expect(variationKey('test_experiment', 'user1')).toBe('variation');
        expect(variationKey('test_experiment', 'alice')).toBe('variation');
        expect(variationKey('test_experiment', 'user6')).toBe('control');
      });

      it('is deterministic across service instances', () => {
        const other = new DecisionService();
        times(50, (i) => {
          const userId = `subject-${i}`;
          expect(other.decideExperiment(config, 'test_experiment', userId)?.variation.id).toBe(
            service.decideExperiment(config, 'test_experiment', userId)?.variation.id,
          );
        });
      });

      it('returns null for unknown experiments', () => {
        expect(variationKey('missing', 'user1')).toBeNull();
      });

      it('returns null for experiments that are not running, whatever the overrides', () => {
        forcedVariationStore.set('test_experiment_not_started', 'user1', 'control_not_started');
        expect(variationKey('test_experiment_not_started', 'user1')).toBeNull();
        expect(variationKey('test_experiment_not_started', 'forced_user1')).toBeNull();
      });

      it('returns null for users in the unallocated range', () => {
        expect(variationKey('test_experiment_capped', 'user6')).toBeNull();
        expect(variationKey('test_experiment_capped', 'user2')).toBe('capped_a');
        expect(variationKey('test_experiment_capped', 'user1')).toBe('capped_b');
      });

      describe('whitelisting', () => {
        it('returns the whitelisted variation', () => {
          expect(variationKey('test_experiment', 'forced_user1')).toBe('control');
          expect(variationKey('test_experiment', 'forced_user2')).toBe('variation');
        });

        it('falls back to bucketing when the whitelisted variation is unknown', () => {
          expect(variationKey('test_experiment', 'forced_user_bad')).toBe('variation');
        });
      });

      describe('forced variations', () => {
        it('take precedence over the whitelist', () => {
          forcedVariationStore.set('test_experiment', 'forced_user2', 'control');
          expect(variationKey('test_experiment', 'forced_user2')).toBe('control');
          forcedVariationStore.set('test_experiment', 'forced_user2', null);
          expect(variationKey('test_experiment', 'forced_user2')).toBe('variation');
        });

        it('take precedence over audience targeting', () => {
          expect(variationKey('test_experiment_with_audience', 'user1')).toBeNull();
          forcedVariationStore.set(
            'test_experiment_with_audience',
            'user1',
            'variation_with_audience',
          );
          expect(variationKey('test_experiment_with_audience', 'user1')).toBe(
            'variation_with_audience',
          );
        });

        it('take precedence over group exclusion', () => {
          expect(variationKey('group_exp_1', 'user1')).toBeNull();
          forcedVariationStore.set('group_exp_1', 'user1', 'g1_control');
          expect(variationKey('group_exp_1', 'user1')).toBe('g1_control');
        });

        it('are ignored when the variation is not in the experiment', () => {
          forcedVariationStore.set('test_experiment', 'user4', 'capped_a');
          expect(variationKey('test_experiment', 'user4')).toBe('control');
        });

        it('are ignored when the store fails', () => {
          const failingStore = new MemoryForcedVariationStore();
          failingStore.get = () => {
            throw new Error('store unavailable');
          };
          const withFailingStore = new DecisionService({ forcedVariationStore: failingStore });
          expect(
            withFailingStore.decideExperiment(config, 'test_experiment', 'user1')?.variation.key,
          ).toBe('variation');
        });
      });

      describe('audiences', () => {
        it('buckets users who match the audience', () => {
          expect(
            variationKey('test_experiment_with_audience', 'user3', { browser_type: 'firefox' }),
          ).toBe('control_with_audience');
          expect(
            variationKey('test_experiment_with_audience', 'user1', { browser_type: 'firefox' }),
          ).toBe('variation_with_audience');
        });

        it('excludes users who do not match', () => {
          expect(
            variationKey('test_experiment_with_audience', 'user3', { browser_type: 'chrome' }),
          ).toBeNull();
          expect(variationKey('test_experiment_with_audience', 'user3')).toBeNull();
        });

        it('evaluates typed audiences', () => {
          expect(variationKey('test_experiment_typed_audience', 'user1', { house: 'Gryffindor' })).toBe(
            'typed_b',
          );
          expect(variationKey('test_experiment_typed_audience', 'user3', { house: 'Slytherin' })).toBe(
            'typed_a',
          );
          expect(variationKey('test_experiment_typed_audience', 'user3', { house: 'Ravenclaw' })).toBeNull();
        });
      });

      describe('bucketing id', () => {
        it('uses the bucketing id attribute instead of the user id', () => {
          expect(variationKey('test_experiment', 'user1', { $opt_bucketing_id: 'user4' })).toBe(
            'control',
          );
        });

        it('ignores a bucketing id that is not a string', () => {
          expect(variationKey('test_experiment', 'user1', { $opt_bucketing_id: 4 })).toBe(
            'variation',
          );
          expect(service.getBucketingId('user1', { $opt_bucketing_id: true })).toBe('user1');
          expect(service.getBucketingId('user1', { $opt_bucketing_id: null })).toBe('user1');
          expect(service.getBucketingId('user1')).toBe('user1');
        });
      });

      describe('mutually exclusive groups', () => {
        it('admits users only to the experiment the group picks', () => {
          expect(variationKey('group_exp_1', 'user2')).toBe('g1_variation');
          expect(variationKey('group_exp_2', 'user2')).toBeNull();
          expect(variationKey('group_exp_1', 'user1')).toBeNull();
          expect(variationKey('group_exp_2', 'user1')).toBe('g2_variation');
        });

        it('admits users in the unallocated group range to no experiment', () => {
          expect(variationKey('group_exp_1', 'user4')).toBeNull();
          expect(variationKey('group_exp_2', 'user4')).toBeNull();
        });

        it('never puts a user in more than one experiment of the group', () => {
          times(300, (i) => {
            const userId = `subject-${i}`;
            const memberships = ['group_exp_1', 'group_exp_2'].filter(
              (experimentKey) => variationKey(experimentKey, userId) !== null,
            );
            expect(memberships.length).toBeLessThanOrEqual(1);
          });
        });

        it('does not apply group bucketing to overlapping groups', () => {
          expect(variationKey('overlapping_exp', 'user1')).toBe('overlapping_variation');
        });
      });

      describe('user profile service', () => {
        it('returns the stored variation', () => {
          const userProfileService = new MemoryUserProfileService();
          userProfileService.save('user1', '111127', '111128');
          expect(
            service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService)
              ?.variation.key,
          ).toBe('control');
        });

        it('saves new assignments', () => {
          const userProfileService = new MemoryUserProfileService();
          service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService);
          expect(userProfileService.lookup('user1')).toEqual({ '111127': '111129' });
        });

        it('does not save whitelisted or forced assignments', () => {
          const userProfileService = new MemoryUserProfileService();
          service.decideExperiment(config, 'test_experiment', 'forced_user1', {}, userProfileService);
          forcedVariationStore.set('test_experiment', 'user1', 'control');
          service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService);
          expect(userProfileService.lookup('forced_user1')).toBeNull();
          expect(userProfileService.lookup('user1')).toBeNull();
        });

        it('checks audiences before the stored variation', () => {
          const userProfileService = new MemoryUserProfileService();
          userProfileService.save('user3', '122227', '122228');
          expect(
            service.decideExperiment(
              config,
              'test_experiment_with_audience',
              'user3',
              { browser_type: 'chrome' },
              userProfileService,
            ),
          ).toBeNull();
        });

        describe('failures', () => {
          let userProfileService: IUserProfileService;

          beforeEach(() => {
            userProfileService = td.object<IUserProfileService>();
          });

          afterEach(() => {
            td.reset();
          });

          it('buckets normally when the lookup throws', () => {
            td.when(userProfileService.lookup('user1')).thenThrow(new Error('lookup failed'));
            expect(
              service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService)
                ?.variation.key,
            ).toBe('variation');
          });

          it('returns the decision when the save throws', () => {
            td.when(userProfileService.lookup('user1')).thenReturn(null);
            td.when(userProfileService.save('user1', '111127', '111129')).thenThrow(
              new Error('save failed'),
            );
            expect(
              service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService)
                ?.variation.key,
            ).toBe('variation');
          });

          it('returns the decision when the save is rejected', () => {
            td.when(userProfileService.lookup('user1')).thenReturn({});
            td.when(userProfileService.save('user1', '111127', '111129')).thenReturn(false);
            expect(
              service.decideExperiment(config, 'test_experiment', 'user1', {}, userProfileService)
                ?.variation.key,
            ).toBe('variation');
            expect(td.explain(userProfileService.save).callCount).toBe(1);
          });
        });
      });
    });

    describe('decideFeature', () => {
      it('returns null for unknown features and features without experiments or rollout', () => {
        expect(service.decideFeature(config, 'missing', 'user1')).toBeNull();
        expect(service.decideFeature(config, 'boolean_feature', 'user1')).toBeNull();
      });

      it('returns the variation of a feature test', () => {
        const decision = service.decideFeature(config, 'multi_variate_feature', 'user5');
        expect(decision?.source).toBe(DecisionSource.EXPERIMENT);
        expect(decision?.experiment.key).toBe('test_experiment_multivariate');
        expect(decision?.variation.key).toBe('Fred');
        expect(service.decideFeature(config, 'multi_variate_feature', 'user4')?.variation.key).toBe(
          'Gred',
        );
      });

      it('tries the experiments of a feature in order', () => {
        expect(service.decideFeature(config, 'mutex_group_feature', 'user2')?.variation.key).toBe(
          'g1_variation',
        );
        expect(service.decideFeature(config, 'mutex_group_feature', 'user1')?.variation.key).toBe(
          'g2_variation',
        );
        expect(service.decideFeature(config, 'mutex_group_feature', 'user4')).toBeNull();
      });

      describe('rollouts', () => {
        it('returns the first rule that matches the audience and traffic', () => {
          const decision = service.decideFeature(config, 'rollout_feature', 'user9', {
            browser_type: 'firefox',
          });
          expect(decision?.source).toBe(DecisionSource.ROLLOUT);
          expect(decision?.experiment.id).toBe('177770');
          expect(decision?.variation.id).toBe('177771');
        });

        it('does not fall through when a matching rule does not allocate the user', () => {
          expect(
            service.decideFeature(config, 'rollout_feature', 'user1', { browser_type: 'firefox' }),
          ).toBeNull();
          expect(
            service.decideFeature(config, 'rollout_feature', 'user6', { browser_type: 'firefox' }),
          ).toBeNull();
        });

        it('moves to the next rule when the audience does not match', () => {
          const chrome = service.decideFeature(config, 'rollout_feature', 'user1', {
            browser_type: 'chrome',
          });
          expect(chrome?.experiment.id).toBe('177772');
          expect(chrome?.variation.featureEnabled).toBe(false);

          const everyoneElse = service.decideFeature(config, 'rollout_feature', 'user1');
          expect(everyoneElse?.experiment.id).toBe('177774');
          expect(everyoneElse?.variation.id).toBe('177775');
        });

        it('returns null when the everyone else rule does not match', () => {
          const modified = cloneDeep(datafile);
          const rules = modified.rollouts?.[0].experiments ?? [];
          rules[rules.length - 1].audienceIds = ['11155'];
          const modifiedConfig = new ConfigIndex(modified);
          expect(service.decideFeature(modifiedConfig, 'rollout_feature', 'user1')).toBeNull();
        });

        it('does not use the user profile service for rollouts', () => {
          const userProfileService = new MemoryUserProfileService();
          service.decideFeature(config, 'rollout_feature', 'user1', {}, userProfileService);
          expect(userProfileService.lookup('user1')).toBeNull();
        });

        it('buckets rollout rules with the bucketing id', () => {
          expect(
            service.decideFeature(config, 'rollout_feature', 'user1', {
              browser_type: 'firefox',
              $opt_bucketing_id: 'user9',
            })?.variation.id,
          ).toBe('177771');
        });
      });
    });
  });
});

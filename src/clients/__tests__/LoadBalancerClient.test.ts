import {
  AddTagsCommand,
  DescribeLoadBalancersCommand,
  DescribeTargetGroupsCommand,
  ElasticLoadBalancingV2Client,
  LoadBalancerNotFoundException
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { LoadBalancerClient } from '../LoadBalancerClient';
import { collectPages } from '../../utils';

describe('LoadBalancerClient', () => {
  let sdk: ElasticLoadBalancingV2Client;
  let sent: unknown[];
  let elb: LoadBalancerClient;

  function respond(handler: (command: unknown) => object): jest.SpyInstance {
    return jest.spyOn(sdk, 'send').mockImplementation(async (command: unknown) => {
      sent.push(command);
      return handler(command);
    });
  }

  beforeEach(() => {
    sdk = new ElasticLoadBalancingV2Client({ region: 'us-east-1' });
    sent = [];
    elb = new LoadBalancerClient(sdk);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should page through load balancers with the marker', async () => {
    respond(command => {
      if (command instanceof DescribeLoadBalancersCommand && command.input.Marker === undefined) {
        return {
          LoadBalancers: [{ LoadBalancerArn: 'arn-a', LoadBalancerName: 'lb-a' }, { LoadBalancerName: 'no-arn' }],
          NextMarker: 'marker-2'
        };
      }
      return { LoadBalancers: [{ LoadBalancerArn: 'arn-b' }] };
    });

    await expect(collectPages(elb.listLoadBalancers())).resolves.toEqual([
      { arn: 'arn-a', name: 'lb-a' },
      { arn: 'arn-b', name: 'arn-b' }
    ]);
    expect(sent).toHaveLength(2);
  });

  it('should merge every tag description', async () => {
    respond(() => ({
      TagDescriptions: [
        { ResourceArn: 'arn-a', Tags: [{ Key: 'team', Value: 'ci' }] },
        { ResourceArn: 'arn-a', Tags: [{ Key: 'aws-gc:marked-for-deletion', Value: 'true' }] }
      ]
    }));

    await expect(elb.describeTags('arn-a')).resolves.toEqual({
      team: 'ci',
      'aws-gc:marked-for-deletion': 'true'
    });
  });

  it('should add tags by ARN', async () => {
    respond(() => ({}));

    await elb.addTags('arn-a', { keep: 'true' });

    const command = sent[0];
    expect(command).toBeInstanceOf(AddTagsCommand);
    if (command instanceof AddTagsCommand) {
      expect(command.input).toEqual({ ResourceArns: ['arn-a'], Tags: [{ Key: 'keep', Value: 'true' }] });
    }
  });

  it('should list the target groups of one load balancer', async () => {
    respond(() => ({
      TargetGroups: [{ TargetGroupArn: 'tg-1', TargetGroupName: 'web' }, { TargetGroupName: 'no-arn' }]
    }));

    await expect(elb.listTargetGroups('arn-a')).resolves.toEqual([{ arn: 'tg-1', name: 'web' }]);

    const command = sent[0];
    expect(command).toBeInstanceOf(DescribeTargetGroupsCommand);
    if (command instanceof DescribeTargetGroupsCommand) {
      expect(command.input.LoadBalancerArn).toBe('arn-a');
    }
  });

  describe('loadBalancerExists', () => {
    it('should report a listed load balancer as existing', async () => {
      respond(() => ({ LoadBalancers: [{ LoadBalancerArn: 'arn-a' }] }));

      await expect(elb.loadBalancerExists('arn-a')).resolves.toBe(true);
    });

    it('should treat a not-found error as gone', async () => {
      respond(() => {
        throw new LoadBalancerNotFoundException({ message: 'One or more load balancers not found', $metadata: {} });
      });

      await expect(elb.loadBalancerExists('arn-a')).resolves.toBe(false);
    });

    it('should rethrow any other error', async () => {
      respond(() => {
        throw new Error('Throttling');
      });

      await expect(elb.loadBalancerExists('arn-a')).rejects.toThrow('Throttling');
    });
  });
});

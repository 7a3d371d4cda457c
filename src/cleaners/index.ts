export { NetworkInterfaceCleaner } from './NetworkInterfaceCleaner';
export { VpcCleaner } from './VpcCleaner';
export { LoadBalancerCleaner } from './LoadBalancerCleaner';
export { createStats, processWorklist, triage } from './CleanupPolicy';

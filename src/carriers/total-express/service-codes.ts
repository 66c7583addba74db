import { ServiceTier } from '../../domain/models';

interface ServiceInfo {
    code: string;
    name: string;
}
const TIER_SERVICE_MAP: Record<ServiceTier, ServiceInfo> = {
    [ServiceTier.Standard]: { code: 'STD', name: 'Total Express Standard' },
    [ServiceTier.Express]: { code: 'EXP', name: 'Total Express Expresso' },
};
export function getServiceCodeForTier(tier: ServiceTier): string {
    return TIER_SERVICE_MAP[tier].code;
}
export function getServiceName(tier: ServiceTier): string {
    return TIER_SERVICE_MAP[tier].name;
}
export function getSupportedTiers(): ServiceTier[] {
    return Object.values(ServiceTier);
}

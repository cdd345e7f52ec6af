import { tokenLifetime } from '../../../common/constants/app.constants';

export interface Settings {
  /** Durable signing secret for kubeconfig-scoped tokens; null until first boot */
  kubeSecretKey: Buffer | null;
  /** Embedded/extension deployments get tokens that effectively never expire */
  isEmbeddedClient: boolean;
  /** Session duration set by an administrator; overrides SESSION_DURATION when present */
  userSessionTimeout: string | null;
  /** Lifetime of kubeconfig tokens; "0" means they never expire */
  kubeconfigExpiry: string;
}

export const defaultSettings = (): Settings => ({
  kubeSecretKey: null,
  isEmbeddedClient: false,
  userSessionTimeout: null,
  kubeconfigExpiry: tokenLifetime.NEVER_EXPIRES,
});

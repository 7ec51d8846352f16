/**
 * Pod types.
 */

export interface PodList {
  /** Pods owned by the user. */
  pods: string[];
  /** Pods shared with the user. */
  sharedPods: string[];
}

export interface PodInfo {
  name: string;
  address: string;
}

export interface SharedPodInfo {
  name: string;
  address: string;
  username: string;
  userAddress: string;
  sharedTime: string;
}

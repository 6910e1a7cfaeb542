/** Wrapper configuration, as loaded from config.yaml over the defaults. */
export interface WrapperConfig {
  privilege: {
    helper: string;
    preserve_env_flag: string;
    degrade_without_helper: boolean;
  };
}

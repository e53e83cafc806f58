export interface BaseConfig {
  test: {
    globals: boolean;
    coverage: {
      provider: "istanbul";
      exclude: string[];
      reporter: [["json", { file: string }]];
      enabled: boolean;
    };
  };
}

export declare const baseConfig: BaseConfig;

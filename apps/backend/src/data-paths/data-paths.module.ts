import { Global, Module } from "@nestjs/common";
import { DATA_PATHS_TOKEN } from "./data-paths.constants";
import { DataPaths, resolveDataPaths } from "./data-paths";

@Global()
@Module({
  providers: [
    {
      provide: DATA_PATHS_TOKEN,
      useFactory: (): Promise<DataPaths> => resolveDataPaths(),
    },
  ],
  exports: [DATA_PATHS_TOKEN],
})
export class DataPathsModule {}

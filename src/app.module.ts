import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import assessmentConfig from './config/assessment.config';
import { TrademarkModule, TrademarkModuleOptions } from './trademark/trademark.module';

@Module({})
export class AppModule {
  static register(options: TrademarkModuleOptions): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [assessmentConfig],
        }),
        TrademarkModule.register(options),
      ],
    };
  }
}

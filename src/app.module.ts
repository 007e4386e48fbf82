import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { trackingConfig } from './config/tracking.config';
import { TrackingModule } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [trackingConfig],
    }),
    TrackingModule.forRootAsync({
      inject: [trackingConfig.KEY],
      useFactory: (config: ConfigType<typeof trackingConfig>) => config,
    }),
  ],
})
export class AppModule {}

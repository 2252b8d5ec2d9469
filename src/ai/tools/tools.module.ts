import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { GithubReposProvider } from './github-repos.provider';
import { WeatherProvider } from './weather.provider';
import { ToolDispatcherService } from './tool-dispatcher.service';
import { TOOL_PROVIDERS, ToolProvider } from './tool.types';
import { EventsModule } from '../events/events.module';
import { TelemetryModule } from '../telemetry/telemetry.module';

@Module({
  imports: [
    HttpModule.register({ timeout: 10000, maxRedirects: 3 }),
    EventsModule,
    TelemetryModule,
  ],
  providers: [
    GithubReposProvider,
    WeatherProvider,
    {
      provide: TOOL_PROVIDERS,
      useFactory: (github: GithubReposProvider, weather: WeatherProvider): ToolProvider[] => [
        github,
        weather,
      ],
      inject: [GithubReposProvider, WeatherProvider],
    },
    ToolDispatcherService,
  ],
  exports: [ToolDispatcherService],
})
export class ToolsModule {}

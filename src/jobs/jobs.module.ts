import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createClient } from '@supabase/supabase-js';
import { AppConfig } from '../config/configuration';
import { JobRepository } from './repositories/job.repository';
import { InMemoryJobRepository } from './repositories/in-memory-job.repository';
import { SupabaseJobRepository } from './repositories/supabase-job.repository';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: JobRepository,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): JobRepository => {
        const storage = configService.getOrThrow<AppConfig['storage']>('storage');
        if (storage.jobStore === 'memory') {
          new Logger('JobsModule').warn(
            'Using in-memory job store; jobs are lost on restart',
          );
          return new InMemoryJobRepository();
        }
        if (!storage.supabaseUrl || !storage.supabaseServiceKey) {
          throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
        }
        const client = createClient(
          storage.supabaseUrl,
          storage.supabaseServiceKey,
          { auth: { persistSession: false, autoRefreshToken: false } },
        );
        return new SupabaseJobRepository(client);
      },
    },
  ],
  exports: [JobRepository],
})
export class JobsModule {}

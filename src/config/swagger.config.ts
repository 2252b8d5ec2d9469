// swagger configuration file
import { DocumentBuilder } from '@nestjs/swagger';
export const swaggerConfig = new DocumentBuilder()
  .setTitle('Portfolio Assistant API')
  .setDescription(
    'Ask natural-language questions about the portfolio: education, experience, projects, skills and case studies',
  )
  .setVersion('1.0')
  .build();

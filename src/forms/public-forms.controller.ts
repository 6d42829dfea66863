import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { FormsService } from './forms.service';
import { PublicSubmissionDto } from './dto/public-submission.dto';
import { Public } from '../common/decorators/public.decorator';
import { LeadView, toLeadView } from '../leads/lead-view';

/** Share-link endpoints; no identity token, tighter rate limit. */
@Public()
@Throttle({ default: { ttl: 60_000, limit: 10 } })
@Controller('public/forms')
export class PublicFormsController {
  constructor(private readonly formsService: FormsService) {}

  @Get(':shareToken')
  findShared(@Param('shareToken') shareToken: string) {
    return this.formsService.findShared(shareToken);
  }

  @Post(':shareToken/submit')
  async submit(
    @Param('shareToken') shareToken: string,
    @Body() dto: PublicSubmissionDto,
  ): Promise<LeadView> {
    return toLeadView(await this.formsService.submitShared(shareToken, dto));
  }
}

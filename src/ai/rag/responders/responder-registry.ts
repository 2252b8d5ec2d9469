import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { EducationResponder } from './education.responder';
import { ExperienceResponder } from './experience.responder';
import { PersonalProjectResponder } from './personal-project.responder';
import { SkillsResponder } from './skills.responder';
import { CaseStudyResponder } from './case-study.responder';
import { ProjectTourResponder } from './project-tour.responder';
import { GeneralResponder } from './general.responder';
import { Intent } from '../rag.types';

@Injectable()
export class ResponderRegistry {
  constructor(
    private readonly education: EducationResponder,
    private readonly experience: ExperienceResponder,
    private readonly personalProject: PersonalProjectResponder,
    private readonly skills: SkillsResponder,
    private readonly caseStudy: CaseStudyResponder,
    private readonly projectTour: ProjectTourResponder,
    private readonly general: GeneralResponder,
  ) {}

  forIntent(intent: Intent): BaseResponder {
    switch (intent) {
      case Intent.EDUCATION:
        return this.education;
      case Intent.EXPERIENCE:
        return this.experience;
      case Intent.PERSONAL_PROJECT:
        return this.personalProject;
      case Intent.SKILLS:
        return this.skills;
      case Intent.CASE_STUDY:
        return this.caseStudy;
      case Intent.PROJECT_TOUR:
        return this.projectTour;
      case Intent.GENERAL:
        return this.general;
      default: {
        const unhandled: never = intent;
        throw new Error(`No responder for intent ${String(unhandled)}`);
      }
    }
  }
}

export const RESPONDERS = [
  EducationResponder,
  ExperienceResponder,
  PersonalProjectResponder,
  SkillsResponder,
  CaseStudyResponder,
  ProjectTourResponder,
  GeneralResponder,
  ResponderRegistry,
];
